/**
 * @module iam/remove-users
 * Delete IAM users after removing their keys, passwords, MFA devices, groups and policies
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * Delete IAM users after removing their keys, passwords, MFA devices, groups and policies
 *
 * @public
 */
export default class IAMRemoveUsersCommand extends RemovalCommand {
  static override readonly description = "Delete IAM users after removing their keys, passwords, MFA devices, groups and policies";

  static override readonly examples = [
    {
      description: "Preview which IAM users match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'temp-*' --dry-run",
    },
    {
      description: "Delete tagged IAM users without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(IAMRemoveUsersCommand);
    await this.sweep(flags, { kind: "IAMUser", noun: "IAM users" });
  }
}
