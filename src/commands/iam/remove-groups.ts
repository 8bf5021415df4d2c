/**
 * @module iam/remove-groups
 * Delete IAM groups after removing their members and policies
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * IAM groups carry no tags, so `--tag` never matches a group; select groups
 * by name or identifier.
 *
 * @public
 */
export default class IAMRemoveGroupsCommand extends RemovalCommand {
  static override readonly description = "Delete IAM groups after removing their members and policies";

  static override readonly examples = [
    {
      description: "Preview which IAM groups match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'team-*' --dry-run",
    },
    {
      description: "Delete groups listed in a file",
      command: "<%= config.bin %> <%= command.id %> --ids-file groups.txt --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(IAMRemoveGroupsCommand);
    await this.sweep(flags, { kind: "IAMGroup", noun: "IAM groups" });
  }
}
