/**
 * @module codepipeline/remove-pipelines
 * Delete CodePipeline pipelines
 *
 */

import { RemovalCommand } from "../removal-command.js";

export default class CodePipelineRemovePipelinesCommand extends RemovalCommand {
  static override readonly description = "Delete CodePipeline pipelines";

  static override readonly examples = [
    {
      description: "Preview which CodePipeline pipelines match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'feature-*' --dry-run",
    },
    {
      description: "Delete tagged CodePipeline pipelines without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(CodePipelineRemovePipelinesCommand);
    await this.sweep(flags, { kind: "CodePipelinePipeline", noun: "CodePipeline pipelines" });
  }
}
