/**
 * @module codebuild/remove-projects
 * Delete CodeBuild projects
 *
 */

import { RemovalCommand } from "../removal-command.js";

/**
 * Delete CodeBuild projects
 *
 * @public
 */
export default class CodeBuildRemoveProjectsCommand extends RemovalCommand {
  static override readonly description = "Delete CodeBuild projects";

  static override readonly examples = [
    {
      description: "Preview which CodeBuild projects match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'feature-*' --dry-run",
    },
    {
      description: "Delete tagged CodeBuild projects without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(CodeBuildRemoveProjectsCommand);
    await this.sweep(flags, { kind: "CodeBuildProject", noun: "CodeBuild projects" });
  }
}
