/**
 * @module ecs/remove-task-definitions
 * Deregister and delete ECS task definition revisions
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * Deregister and delete ECS task definition revisions
 *
 * @public
 */
export default class ECSRemoveTaskDefinitionsCommand extends RemovalCommand {
  static override readonly description = "Deregister and delete ECS task definition revisions";

  static override readonly examples = [
    {
      description: "Preview which ECS task definitions match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'legacy-*' --dry-run",
    },
    {
      description: "Delete two specific revisions",
      command: "<%= config.bin %> <%= command.id %> --id web:3 --id web:4",
    },
    {
      description: "Delete tagged ECS task definitions without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ECSRemoveTaskDefinitionsCommand);
    await this.sweep(flags, { kind: "ECSTaskDefinition", noun: "ECS task definitions" });
  }
}
