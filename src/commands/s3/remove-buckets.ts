/**
 * @module s3/remove-buckets
 * Delete S3 buckets together with every object version and delete marker
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * Delete S3 buckets together with every object version and delete marker
 *
 * @public
 */
export default class S3RemoveBucketsCommand extends RemovalCommand {
  static override readonly description = "Delete S3 buckets together with every object version and delete marker";

  static override readonly examples = [
    {
      description: "Preview which S3 buckets match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'test-*' --dry-run",
    },
    {
      description: "Delete tagged S3 buckets without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(S3RemoveBucketsCommand);
    await this.sweep(flags, { kind: "Bucket", noun: "S3 buckets" });
  }
}
