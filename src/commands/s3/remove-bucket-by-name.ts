/**
 * @module s3/remove-bucket-by-name
 * S3 single bucket removal command
 *
 */

import { Args } from "@oclif/core";
import { RemovalCommand } from "../removal-command.js";

/**
 * Empties and deletes one bucket, selected by its exact name
 *
 * @public
 */
export default class S3RemoveBucketByNameCommand extends RemovalCommand {
  static override readonly description =
    "Delete one S3 bucket by name, removing every object version and delete marker first";

  static override readonly examples = [
    {
      description: "Delete a bucket after confirmation",
      command: "<%= config.bin %> <%= command.id %> my-scratch-bucket",
    },
    {
      description: "Show what would be removed",
      command: "<%= config.bin %> <%= command.id %> my-scratch-bucket --dry-run --region eu-west-1",
    },
  ];

  static override readonly args = {
    name: Args.string({
      name: "name",
      description: "Name of the bucket to delete",
      required: true,
    }),
  };

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { args, flags } = await this.parse(S3RemoveBucketByNameCommand);
    await this.sweep(flags, { kind: "Bucket", noun: "S3 buckets", ids: [args.name] });
  }
}
