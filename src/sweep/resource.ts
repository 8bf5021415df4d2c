/**
 * @module resource
 * Resource model for discovery and deletion
 *
 * The set of resource kinds is closed. {@link Resource} is a discriminated
 * union over `kind`; each case carries the metadata its deletion needs in
 * `meta`. Resources form an eagerly built tree: `dependents` holds everything
 * that must be removed before the owner itself, in removal order.
 *
 * @public
 */

import { InvalidStateTransitionError } from "../lib/sweep-errors.js";

/**
 * The (profile, region) pair a command operates against
 *
 * @public
 */
export interface Scope {
  /** AWS region */
  region: string;
  /** Named profile; the default credential chain is used when absent */
  profile?: string;
}

/**
 * IAM entity that a policy can be attached to
 *
 * @public
 */
export interface IamPrincipal {
  type: "role" | "user" | "group";
  name: string;
}

/**
 * One object version or delete marker inside a bucket
 *
 * @public
 */
export interface ObjectVersionRef {
  key: string;
  versionId?: string;
}

/**
 * Kind-specific metadata, keyed by kind
 *
 * @public
 */
export interface ResourceMetadata {
  Bucket: { creationDate?: string };
  S3ObjectVersionBatch: { bucket: string; objects: ObjectVersionRef[] };
  CodeBuildProject: Record<string, never>;
  CodePipelinePipeline: Record<string, never>;
  EC2Instance: { instanceState?: string; instanceType?: string };
  ECSCluster: { status?: string };
  ECSService: { cluster: string; status?: string };
  ECSTask: { cluster: string };
  ECSContainerInstance: { cluster: string };
  ECSTaskDefinition: { family: string; revision: number; status?: string };
  IAMRole: { path?: string };
  IAMUser: { path?: string };
  IAMGroup: { path?: string };
  IAMPolicy: { defaultVersionId?: string };
  IAMInstanceProfileMembership: { roleName: string; instanceProfileName: string };
  IAMAttachedPolicy: { principal: IamPrincipal; policyArn: string };
  IAMInlinePolicy: { principal: IamPrincipal; policyName: string };
  IAMAccessKey: { userName: string; accessKeyId: string };
  IAMLoginProfile: { userName: string };
  IAMMfaDevice: { userName: string; serialNumber: string };
  IAMSshPublicKey: { userName: string; sshPublicKeyId: string };
  IAMSigningCertificate: { userName: string; certificateId: string };
  IAMServiceSpecificCredential: { userName: string; credentialId: string };
  IAMGroupMembership: { userName: string; groupName: string };
  IAMPolicyAttachment: { policyArn: string; principal: IamPrincipal };
  IAMPolicyVersion: { policyArn: string; versionId: string };
  ECRRepository: { registryId?: string };
  DynamoDBTable: { status?: string };
}

/**
 * Closed enumeration of resource kinds
 *
 * @public
 */
export type ResourceKind = keyof ResourceMetadata;

/**
 * Lifecycle of a resource within one run
 *
 * @public
 */
export type ResourceState = "Discovered" | "PendingDelete" | "Deleted" | "Failed";

/**
 * A resource of one specific kind
 *
 * @public
 */
export interface ResourceNode<K extends ResourceKind> {
  readonly kind: K;
  /** Unique within (kind, scope) for the run */
  readonly id: string;
  readonly name: string;
  readonly arn?: string;
  readonly scope: Scope;
  readonly tags: Readonly<Record<string, string>>;
  readonly meta: ResourceMetadata[K];
  /** Removed before this resource, in order */
  dependents: Resource[];
  state: ResourceState;
}

/**
 * Any resource, discriminated on `kind`
 *
 * @public
 */
export type Resource = { [K in ResourceKind]: ResourceNode<K> }[ResourceKind];

/**
 * Fields supplied when a resource is discovered
 *
 * @public
 */
export interface ResourceInit<K extends ResourceKind> {
  id: string;
  name?: string;
  arn?: string | undefined;
  scope: Scope;
  tags?: Record<string, string>;
  meta: ResourceMetadata[K];
}

/**
 * Kinds that must be discovered and removed before a resource of each kind
 *
 * @public
 */
export type DependencyRules = { readonly [K in ResourceKind]: readonly ResourceKind[] };

/**
 * AWS deletion-order constraints per kind
 *
 * @remarks
 * - a bucket must hold no object versions or delete markers
 * - ECS clusters refuse deletion while services, tasks or container instances remain;
 *   services go first since stopping a service's tasks is the service's job
 * - IAM roles, users and groups must have no attached or inline policies and no
 *   memberships; users additionally no access keys, console password, MFA devices,
 *   SSH keys, signing certificates or service-specific credentials
 * - customer managed policies must be detached everywhere and have no
 *   non-default versions
 *
 * @public
 */
export const DEPENDENCY_RULES: DependencyRules = {
  Bucket: ["S3ObjectVersionBatch"],
  S3ObjectVersionBatch: [],
  CodeBuildProject: [],
  CodePipelinePipeline: [],
  EC2Instance: [],
  ECSCluster: ["ECSService", "ECSTask", "ECSContainerInstance"],
  ECSService: [],
  ECSTask: [],
  ECSContainerInstance: [],
  ECSTaskDefinition: [],
  IAMRole: ["IAMInstanceProfileMembership", "IAMAttachedPolicy", "IAMInlinePolicy"],
  IAMUser: [
    "IAMAccessKey",
    "IAMLoginProfile",
    "IAMMfaDevice",
    "IAMSshPublicKey",
    "IAMSigningCertificate",
    "IAMServiceSpecificCredential",
    "IAMGroupMembership",
    "IAMAttachedPolicy",
    "IAMInlinePolicy",
  ],
  IAMGroup: ["IAMGroupMembership", "IAMAttachedPolicy", "IAMInlinePolicy"],
  IAMPolicy: ["IAMPolicyAttachment", "IAMPolicyVersion"],
  IAMInstanceProfileMembership: [],
  IAMAttachedPolicy: [],
  IAMInlinePolicy: [],
  IAMAccessKey: [],
  IAMLoginProfile: [],
  IAMMfaDevice: [],
  IAMSshPublicKey: [],
  IAMSigningCertificate: [],
  IAMServiceSpecificCredential: [],
  IAMGroupMembership: [],
  IAMPolicyAttachment: [],
  IAMPolicyVersion: [],
  ECRRepository: [],
  DynamoDBTable: [],
};

const ALLOWED_TRANSITIONS: Readonly<Record<ResourceState, readonly ResourceState[]>> = {
  Discovered: ["PendingDelete"],
  PendingDelete: ["Deleted", "Failed"],
  Deleted: [],
  Failed: [],
};

/**
 * Create a freshly discovered resource
 *
 * @param kind - Resource kind
 * @param init - Identifier, scope and kind-specific metadata
 * @returns Resource in the `Discovered` state with no dependents
 *
 * @public
 */
export function createResource<K extends ResourceKind>(
  kind: K,
  init: ResourceInit<K>,
): ResourceNode<K> {
  return {
    kind,
    id: init.id,
    name: init.name ?? init.id,
    ...(init.arn !== undefined && { arn: init.arn }),
    scope: init.scope,
    tags: init.tags ?? {},
    meta: init.meta,
    dependents: [],
    state: "Discovered",
  };
}

/**
 * Move a resource to its next state
 *
 * @throws {@link InvalidStateTransitionError} when the move is not forward
 *
 * @public
 */
export function transition(resource: Resource, next: ResourceState): void {
  if (!ALLOWED_TRANSITIONS[resource.state].includes(next)) {
    throw new InvalidStateTransitionError(resource.id, resource.state, next);
  }
  resource.state = next;
}

/**
 * Whether the state is final
 *
 * @public
 */
export function isTerminal(state: ResourceState): boolean {
  return state === "Deleted" || state === "Failed";
}

/**
 * Count a resource and everything beneath it
 *
 * @public
 */
export function countTree(resource: Resource): number {
  return resource.dependents.reduce((total, dependent) => total + countTree(dependent), 1);
}
