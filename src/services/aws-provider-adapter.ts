/**
 * @module aws-provider-adapter
 * AWS implementation of the provider client adapter
 *
 * Dispatches each request by kind to the handler of the owning service.
 * Top-level listings with a tag filter go through the Resource Groups Tagging
 * API when the kind supports it; everything else is listed natively.
 *
 * @public
 */

import {
  DeleteConflictError,
  DeleteNotFoundError,
  ProviderUnavailableError,
} from "../lib/sweep-errors.js";
import { Logger } from "../lib/logger.js";
import type { ListPageRequest, ProviderClientAdapter, ResourcePage } from "../sweep/adapter.js";
import type { Resource, ResourceKind, ResourceNode, Scope } from "../sweep/resource.js";
import { CodeBuildService } from "./codebuild-service.js";
import { CodePipelineService } from "./codepipeline-service.js";
import { CredentialService, type CallerIdentity } from "./credential-service.js";
import { DynamoDBService } from "./dynamodb-service.js";
import { EC2Service } from "./ec2-service.js";
import { ECRService } from "./ecr-service.js";
import { ECSService } from "./ecs-service.js";
import type { AwsKindHandler, AwsKindHandlers } from "./handler-types.js";
import { IAMService } from "./iam-service.js";
import { S3Service } from "./s3-service.js";
import { TaggingService } from "./tagging-service.js";

/**
 * Service instances backing the adapter
 *
 * @public
 */
export interface AwsServices {
  credentials: CredentialService;
  tagging: TaggingService;
  s3: S3Service;
  codeBuild: CodeBuildService;
  codePipeline: CodePipelineService;
  ec2: EC2Service;
  ecs: ECSService;
  iam: IAMService;
  ecr: ECRService;
  dynamoDB: DynamoDBService;
}

/**
 * Options for {@link createAwsServices}
 *
 * @public
 */
export interface AwsServicesOptions {
  logger?: Logger;
  /** Custom endpoint URL, for local emulators */
  endpoint?: string;
  /** Wait for EC2 instances to reach `terminated` */
  waitForTermination?: boolean;
}

/**
 * Account details shown before deleting anything
 *
 * @public
 */
export interface AccountSummary extends CallerIdentity {
  aliases: string[];
}

/**
 * Listing side of any kind handler
 */
interface HandlerListing {
  listPage(request: ListPageRequest): Promise<ResourcePage>;
  taggingResourceType?: string;
  fromArn?: (arn: string, tags: Record<string, string>, scope: Scope) => Resource | undefined;
}

/**
 * Create every service over one shared credential service
 *
 * @public
 */
export function createAwsServices(options: AwsServicesOptions = {}): AwsServices {
  const logger = options.logger ?? new Logger();
  const credentialService = new CredentialService({
    logger,
    ...(options.endpoint && { endpoint: options.endpoint }),
  });
  const serviceOptions = { credentialService, logger };

  return {
    credentials: credentialService,
    tagging: new TaggingService(serviceOptions),
    s3: new S3Service(serviceOptions),
    codeBuild: new CodeBuildService(serviceOptions),
    codePipeline: new CodePipelineService(serviceOptions),
    ec2: new EC2Service({
      ...serviceOptions,
      ...(options.waitForTermination !== undefined && { waitForTermination: options.waitForTermination }),
    }),
    ecs: new ECSService(serviceOptions),
    iam: new IAMService(serviceOptions),
    ecr: new ECRService(serviceOptions),
    dynamoDB: new DynamoDBService(serviceOptions),
  };
}

/**
 * Provider client adapter over the AWS services
 *
 * @public
 */
export class AwsProviderAdapter implements ProviderClientAdapter {
  private readonly handlers: AwsKindHandlers<ResourceKind>;

  constructor(private readonly services: AwsServices) {
    this.handlers = {
      ...services.s3.handlers(),
      ...services.codeBuild.handlers(),
      ...services.codePipeline.handlers(),
      ...services.ec2.handlers(),
      ...services.ecs.handlers(),
      ...services.iam.handlers(),
      ...services.ecr.handlers(),
      ...services.dynamoDB.handlers(),
    };
  }

  /**
   * List one page of a kind
   *
   * A vanished owner yields an empty page of its dependents; a conflict while
   * listing is reported as the provider being unavailable.
   */
  async listPage(request: ListPageRequest): Promise<ResourcePage> {
    const handler: HandlerListing = this.handlers[request.kind];

    try {
      if (request.tagFilter && !request.parent && handler.taggingResourceType && handler.fromArn) {
        return await this.listTagged(request, handler.taggingResourceType, handler.fromArn);
      }
      return await handler.listPage(request);
    } catch (error) {
      if (error instanceof DeleteNotFoundError && request.parent !== undefined) {
        return { resources: [] };
      }
      if (error instanceof DeleteConflictError) {
        throw new ProviderUnavailableError(error.message, `list ${request.kind}`, error);
      }
      throw error;
    }
  }

  async deleteOne(resource: Resource): Promise<void> {
    await this.dispatch(resource);
  }

  /**
   * Identify the account and its aliases behind a scope
   */
  async describeAccount(scope: Scope): Promise<AccountSummary> {
    const identity = await this.services.credentials.getCallerIdentity(scope);
    const aliases = await this.services.iam.listAccountAliases(scope);
    return { ...identity, aliases };
  }

  private dispatch<K extends ResourceKind>(resource: ResourceNode<K>): Promise<void> {
    const handler: AwsKindHandler<K> = this.handlers[resource.kind];
    return handler.deleteOne(resource);
  }

  private async listTagged(
    request: ListPageRequest,
    resourceType: string,
    fromArn: NonNullable<HandlerListing["fromArn"]>,
  ): Promise<ResourcePage> {
    const { scope } = request;
    const page = await this.services.tagging.getResources(
      scope,
      resourceType,
      request.tagFilter ?? {},
      request.pageToken,
    );

    const resources = page.resources.flatMap(({ arn, tags }) => {
      const resource = fromArn(arn, tags, scope);
      return resource ? [resource] : [];
    });

    return { resources, ...(page.nextPageToken && { nextPageToken: page.nextPageToken }) };
  }
}
