/**
 * @module iam/remove-roles
 * Delete IAM roles after detaching their policies and instance profiles
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * Delete IAM roles after detaching their policies and instance profiles
 *
 * @public
 */
export default class IAMRemoveRolesCommand extends RemovalCommand {
  static override readonly description = "Delete IAM roles after detaching their policies and instance profiles";

  static override readonly examples = [
    {
      description: "Preview which IAM roles match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'ci-*' --dry-run",
    },
    {
      description: "Delete tagged IAM roles without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(IAMRemoveRolesCommand);
    await this.sweep(flags, { kind: "IAMRole", noun: "IAM roles" });
  }
}
