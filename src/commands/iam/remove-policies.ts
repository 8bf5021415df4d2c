/**
 * @module iam/remove-policies
 * Delete customer managed IAM policies after detaching them everywhere
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * Only customer managed policies are listed; AWS managed policies are never
 * candidates. Non-default versions are deleted before the policy.
 *
 * @public
 */
export default class IAMRemovePoliciesCommand extends RemovalCommand {
  static override readonly description = "Delete customer managed IAM policies after detaching them everywhere";

  static override readonly examples = [
    {
      description: "Preview which IAM policies match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'deploy-*' --dry-run",
    },
    {
      description: "Delete tagged IAM policies without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(IAMRemovePoliciesCommand);
    await this.sweep(flags, { kind: "IAMPolicy", noun: "IAM policies" });
  }
}
