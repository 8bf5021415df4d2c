/**
 * @module ec2/remove-instances
 * EC2 instance termination command
 *
 * Terminates every matching instance that is not already terminated.
 *
 */

import { Flags } from "@oclif/core";
import { RemovalCommand } from "../removal-command.js";

/**
 * EC2 instance termination command
 *
 * @public
 */
export default class EC2RemoveInstancesCommand extends RemovalCommand {
  static override readonly description = "Terminate EC2 instances";

  static override readonly examples = [
    {
      description: "Terminate instances whose Name tag starts with load-test-",
      command: "<%= config.bin %> <%= command.id %> --name 'load-test-*'",
    },
    {
      description: "Terminate specific instances and wait until they are gone",
      command: "<%= config.bin %> <%= command.id %> --id i-0123456789abcdef0 --wait --yes",
    },
    {
      description: "Terminate tagged instances in another region",
      command: "<%= config.bin %> <%= command.id %> --tag Owner=ci --region us-west-2",
    },
  ];

  static override readonly flags = {
    ...RemovalCommand.removalFlags,

    wait: Flags.boolean({
      description: "Wait for each instance to reach the terminated state",
      default: false,
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(EC2RemoveInstancesCommand);
    await this.sweep(flags, {
      kind: "EC2Instance",
      noun: "EC2 instances",
      services: { waitForTermination: flags.wait },
    });
  }
}
