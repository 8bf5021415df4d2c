/**
 * Unit tests for scoped SDK client configuration and caller identity
 */

import { GetCallerIdentityCommand, STSClient } from "@aws-sdk/client-sts";
import { mockClient } from "aws-sdk-client-mock";
import { beforeEach, describe, expect, it } from "vitest";
import { ConfigurationError } from "../../../src/lib/errors.js";
import { Logger, LogLevel } from "../../../src/lib/logger.js";
import { CredentialService } from "../../../src/services/credential-service.js";
import { awsError } from "../../utils/aws-mocks.js";

const stsMock = mockClient(STSClient);

describe("CredentialService", () => {
  let service: CredentialService;

  beforeEach(() => {
    stsMock.reset();
    service = new CredentialService({ logger: new Logger({ level: LogLevel.SILENT }) });
  });

  describe("getClientConfig", () => {
    it("should bind the region and turn SDK retries off", () => {
      const config = service.getClientConfig({ region: "eu-west-1", profile: "sandbox" });

      expect(config).toMatchObject({ region: "eu-west-1", maxAttempts: 1 });
      expect(config).not.toHaveProperty("endpoint");
    });

    it("should pass a custom endpoint through", () => {
      const local = new CredentialService({ endpoint: "http://localhost:4566" });

      expect(local.getClientConfig({ region: "us-east-1" }).endpoint).toBe("http://localhost:4566");
    });

    it("should reuse one provider per profile", () => {
      expect(service.getCredentialProvider("sandbox")).toBe(service.getCredentialProvider("sandbox"));
      expect(service.getCredentialProvider("sandbox")).not.toBe(service.getCredentialProvider());
    });
  });

  describe("resolveRegion", () => {
    it("should take the region from the environment", async () => {
      process.env.AWS_REGION = "eu-central-1";

      await expect(service.resolveRegion()).resolves.toBe("eu-central-1");
    });

    it("should describe a missing region as a configuration problem", async () => {
      process.env.AWS_CONFIG_FILE = "/nonexistent/aws-config";

      const error = await service.resolveRegion("sandbox").catch((error_: unknown) => error_);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        message: "No AWS region configured for profile sandbox: pass --region or set AWS_REGION",
      });
    });
  });

  describe("getCallerIdentity", () => {
    it("should return the caller identity", async () => {
      stsMock.on(GetCallerIdentityCommand).resolves({
        UserId: "AIDATEST",
        Account: "123456789012",
        Arn: "arn:aws:iam::123456789012:user/ci",
      });

      await expect(service.getCallerIdentity({ region: "eu-west-1" })).resolves.toEqual({
        userId: "AIDATEST",
        account: "123456789012",
        arn: "arn:aws:iam::123456789012:user/ci",
      });
    });

    it("should reject an incomplete identity", async () => {
      stsMock.on(GetCallerIdentityCommand).resolves({ Account: "123456789012" });

      await expect(service.getCallerIdentity({ region: "eu-west-1" })).rejects.toMatchObject({
        code: "PROVIDER_UNAVAILABLE",
        message: "STS returned an incomplete caller identity",
      });
    });

    it("should classify rejected credentials", async () => {
      stsMock.on(GetCallerIdentityCommand).rejects(awsError("InvalidClientTokenId", "The security token included in the request is invalid."));

      await expect(service.getCallerIdentity({ region: "eu-west-1" })).rejects.toMatchObject({
        code: "PROVIDER_UNAVAILABLE",
        message: "sts:GetCallerIdentity failed: The security token included in the request is invalid.",
        metadata: { operation: "sts:GetCallerIdentity", awsErrorName: "InvalidClientTokenId" },
      });
    });
  });
});
