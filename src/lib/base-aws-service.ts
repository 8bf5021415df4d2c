/**
 * @module base-aws-service
 * Base class for the per-service resource handlers
 *
 * Provides AWS SDK client caching per scope and translation of SDK exceptions
 * into the sweep error taxonomy. Each service class extends this base and
 * exposes kind handlers for the adapter to dispatch to.
 *
 * @example
 * ```typescript
 * export class CodeBuildService extends BaseAwsService<CodeBuildClient> {
 *   constructor(options: BaseServiceOptions = {}) {
 *     super((config) => new CodeBuildClient(config), options);
 *   }
 *
 *   async deleteProject(project: ResourceNode<"CodeBuildProject">): Promise<void> {
 *     await this.call("codebuild:DeleteProject", project.scope, (client) =>
 *       client.send(new DeleteProjectCommand({ name: project.id })),
 *     project.id);
 *   }
 * }
 * ```
 *
 * @public
 */

import { CredentialService, type SdkClientConfig } from "../services/credential-service.js";
import type { Scope } from "../sweep/resource.js";
import { Logger } from "./logger.js";
import { classifyProviderError } from "./sweep-errors.js";

/**
 * Base configuration options for AWS services
 *
 * @public
 */
export interface BaseServiceOptions {
  /**
   * Shared credential service; one is created when absent
   */
  credentialService?: CredentialService;

  logger?: Logger;
}

/**
 * Base AWS service class providing common functionality
 *
 * @typeParam TClient - AWS SDK client type
 *
 * @public
 */
export abstract class BaseAwsService<TClient> {
  /** Credential service for AWS authentication */
  protected readonly credentialService: CredentialService;

  protected readonly logger: Logger;

  /** Cache for AWS SDK client instances */
  private readonly clientCache = new Map<string, TClient>();

  /**
   * @param clientFactory - Builds an SDK client from its configuration
   * @param options - Service configuration options
   */
  constructor(
    private readonly clientFactory: (config: SdkClientConfig) => TClient,
    options: BaseServiceOptions = {},
  ) {
    this.logger = options.logger ?? new Logger();
    this.credentialService =
      options.credentialService ?? new CredentialService({ logger: this.logger });
  }

  /**
   * Get or create the client for a scope
   *
   * @internal
   */
  protected getClient(scope: Scope): TClient {
    const cacheKey = this.generateCacheKey(scope);
    let client = this.clientCache.get(cacheKey);

    if (!client) {
      client = this.credentialService.createClient(this.clientFactory, scope);
      this.clientCache.set(cacheKey, client);
    }

    return client;
  }

  /**
   * Run one provider call, translating SDK exceptions
   *
   * @param operation - Label such as `s3:DeleteBucket`, used in errors
   * @param scope - Scope selecting the client
   * @param request - The SDK call
   * @param resourceId - Target of a deletion
   * @returns The SDK response
   * @throws One of the provider errors from `sweep-errors.ts`
   *
   * @internal
   */
  protected async call<T>(
    operation: string,
    scope: Scope,
    request: (client: TClient) => Promise<T>,
    resourceId?: string,
  ): Promise<T> {
    try {
      return await request(this.getClient(scope));
    } catch (error) {
      throw classifyProviderError(error, operation, resourceId);
    }
  }

  /**
   * Cache key in the form `{region}::{profile}`
   *
   * @internal
   */
  private generateCacheKey(scope: Scope): string {
    const region = this.sanitizeIdentifier(scope.region);
    const profile = this.sanitizeIdentifier(scope.profile ?? "default");
    return `${region}::${profile}`;
  }

  private sanitizeIdentifier(value: string): string {
    return value.replaceAll(/[^a-zA-Z0-9-_]/g, "_");
  }
}
