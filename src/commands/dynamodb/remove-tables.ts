/**
 * @module dynamodb/remove-tables
 * Delete DynamoDB tables
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * DynamoDB tables removal command
 *
 * Tables with deletion protection enabled are reported as failed.
 *
 * @public
 */
export default class DynamoDBRemoveTablesCommand extends RemovalCommand {
  static override readonly description = "Delete DynamoDB tables";

  static override readonly examples = [
    {
      description: "Preview which DynamoDB tables match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'staging-*' --dry-run",
    },
    {
      description: "Delete tagged DynamoDB tables without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(DynamoDBRemoveTablesCommand);
    await this.sweep(flags, { kind: "DynamoDBTable", noun: "DynamoDB tables" });
  }
}
