/**
 * AWS credential service for SDK integration
 *
 * Creates AWS SDK clients bound to a sweep scope. Credentials come from the
 * node provider chain for the selected profile and are resolved lazily on the
 * first request. SDK-level retries are disabled: the sweep retry policy is the
 * only one in force.
 *
 */

import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import { fromNodeProviderChain } from "@aws-sdk/credential-providers";
import { ConfigurationError } from "../lib/errors.js";
import { Logger } from "../lib/logger.js";
import { classifyProviderError, ProviderUnavailableError } from "../lib/sweep-errors.js";
import type { Scope } from "../sweep/resource.js";

/**
 * Credential provider returned by the node provider chain
 *
 * @public
 */
export type CredentialProvider = ReturnType<typeof fromNodeProviderChain>;

/**
 * Configuration handed to every AWS SDK client constructor
 *
 * @public
 */
export interface SdkClientConfig {
  region: string;
  credentials: CredentialProvider;
  maxAttempts: number;
  endpoint?: string;
}

/**
 * Configuration options for credential service
 *
 * @public
 */
export interface CredentialServiceOptions {
  /**
   * Custom endpoint URL, for local emulators
   */
  endpoint?: string;

  /**
   * Timeout for credential resolution in milliseconds (default: 30000)
   */
  timeout?: number;

  logger?: Logger;
}

/**
 * Caller identity information from AWS STS
 *
 * @public
 */
export interface CallerIdentity {
  userId: string;
  account: string;
  arn: string;
}

/**
 * AWS credential service for SDK integration
 *
 * @public
 */
export class CredentialService {
  private readonly providers = new Map<string, CredentialProvider>();
  private readonly logger: Logger;

  /**
   * Create a new credential service instance
   *
   * @param options - Configuration options for the service
   */
  constructor(private readonly options: CredentialServiceOptions = {}) {
    this.logger = (options.logger ?? new Logger()).child({}, "credentials");
  }

  /**
   * Get the (cached) credential provider for a profile
   *
   * @param profile - AWS profile name; the default chain is used when absent
   * @returns Provider that resolves credentials on first use
   */
  getCredentialProvider(profile?: string): CredentialProvider {
    const cacheKey = `credentials-${profile ?? "default-chain"}`;
    let provider = this.providers.get(cacheKey);

    if (!provider) {
      const timeout = this.options.timeout ?? 30_000;
      provider = profile
        ? fromNodeProviderChain({ profile, timeout })
        : fromNodeProviderChain({ timeout });
      this.providers.set(cacheKey, provider);
      this.logger.debug("Created credential provider", { profile: profile ?? "default chain" });
    }

    return provider;
  }

  /**
   * Build the SDK client configuration for a scope
   *
   * @param scope - Profile and region the client operates in
   */
  getClientConfig(scope: Scope): SdkClientConfig {
    return {
      region: scope.region,
      credentials: this.getCredentialProvider(scope.profile),
      maxAttempts: 1,
      ...(this.options.endpoint && { endpoint: this.options.endpoint }),
    };
  }

  /**
   * Create a generic AWS client with proper credentials
   *
   * @param factory - Builds the client from its configuration
   * @param scope - Profile and region
   * @returns Configured AWS client
   *
   * @example
   * ```typescript
   * const credentialService = new CredentialService();
   * const s3 = credentialService.createClient((config) => new S3Client(config), {
   *   region: "eu-west-1",
   *   profile: "sandbox",
   * });
   * ```
   */
  createClient<T>(factory: (config: SdkClientConfig) => T, scope: Scope): T {
    return factory(this.getClientConfig(scope));
  }

  /**
   * Resolve the region of a profile when none was given explicitly
   *
   * Follows the SDK's own lookup: `AWS_REGION`, then the profile's `region`
   * in the shared config file.
   *
   * @param profile - AWS profile name
   * @throws {@link ConfigurationError} When no region is configured
   */
  async resolveRegion(profile?: string): Promise<string> {
    const client = new STSClient(profile ? { profile } : {});

    try {
      return await client.config.region();
    } catch (error) {
      throw new ConfigurationError(
        `No AWS region configured${profile ? ` for profile ${profile}` : ""}: pass --region or set AWS_REGION`,
        "region",
        "an AWS region such as eu-west-1",
        error instanceof Error ? error.message : undefined,
      );
    } finally {
      client.destroy();
    }
  }

  /**
   * Identify the account behind a scope with STS GetCallerIdentity
   *
   * @param scope - Profile and region
   * @returns Caller identity of the resolved credentials
   * @throws {@link ProviderUnavailableError} When credentials cannot be resolved
   */
  async getCallerIdentity(scope: Scope): Promise<CallerIdentity> {
    const client = this.createClient((config) => new STSClient(config), scope);

    try {
      const response = await client.send(new GetCallerIdentityCommand({}));

      if (!response.UserId || !response.Account || !response.Arn) {
        throw new ProviderUnavailableError(
          "STS returned an incomplete caller identity",
          "sts:GetCallerIdentity",
        );
      }

      return { userId: response.UserId, account: response.Account, arn: response.Arn };
    } catch (error) {
      throw classifyProviderError(error, "sts:GetCallerIdentity");
    }
  }
}
