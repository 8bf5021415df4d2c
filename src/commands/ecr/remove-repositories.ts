/**
 * @module ecr/remove-repositories
 * Delete ECR repositories including their images
 *
 */

import { RemovalCommand } from "../removal-command.js";

export default class ECRRemoveRepositoriesCommand extends RemovalCommand {
  static override readonly description = "Delete ECR repositories including their images";

  static override readonly examples = [
    {
      description: "Preview which ECR repositories match a name pattern",
      command: "<%= config.bin %> <%= command.id %> --name 'scratch/*' --dry-run",
    },
    {
      description: "Delete tagged ECR repositories without a confirmation prompt",
      command: "<%= config.bin %> <%= command.id %> --tag Environment=dev --yes",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ECRRemoveRepositoriesCommand);
    await this.sweep(flags, { kind: "ECRRepository", noun: "ECR repositories" });
  }
}
