/**
 * @module ecs/remove-services
 * ECS service removal command
 *
 * Services are force-deleted (scaling them to zero) and awaited until
 * inactive. Without `--cluster` every cluster in the region is searched.
 *
 */

import { Flags } from "@oclif/core";
import { createResource } from "../../sweep/resource.js";
import { RemovalCommand } from "../removal-command.js";

/**
 * ECS service removal command
 *
 * @public
 */
export default class ECSRemoveServicesCommand extends RemovalCommand {
  static override readonly description = "Delete ECS services";

  static override readonly examples = [
    {
      description: "Delete services of one cluster matching a pattern",
      command: "<%= config.bin %> <%= command.id %> --cluster staging --name 'preview-*'",
    },
    {
      description: "Delete tagged services in every cluster",
      command: "<%= config.bin %> <%= command.id %> --tag Team=payments --dry-run",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,

    cluster: Flags.string({
      char: "c",
      description: "Only services of this cluster (name or ARN)",
      helpValue: "CLUSTER",
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ECSRemoveServicesCommand);
    const { cluster } = flags;

    await this.sweep(flags, {
      kind: "ECSService",
      noun: "ECS services",
      ...(cluster && {
        parent: (scope) => createResource("ECSCluster", { id: cluster, scope, meta: {} }),
      }),
    });
  }
}
