/**
 * @module ecs/remove-clusters
 * Delete ECS clusters after removing their services, tasks and container instances
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * Delete ECS clusters after removing their services, tasks and container instances
 *
 * @public
 */
export default class ECSRemoveClustersCommand extends RemovalCommand {
  static override readonly description = "Delete ECS clusters after removing their services, tasks and container instances";

  static override readonly examples = [
    {
      description: "Preview which ECS clusters match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'sandbox-*' --dry-run",
    },
    {
      description: "Delete tagged ECS clusters without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ECSRemoveClustersCommand);
    await this.sweep(flags, { kind: "ECSCluster", noun: "ECS clusters" });
  }
}
