/**
 * @module bucket/plan
 * Control-plane plan command
 *
 * Compiles a descriptor and lists the S3 control-plane requests that would
 * apply the bundle, in order. Nothing is sent.
 *
 */

import { buildControlPlanePlan } from "../../services/compiler/control-plane-plan.js";
import { BaseCommand } from "../base-command.js";

/**
 * Show the S3 requests that would apply a bucket descriptor
 *
 * @public
 */
export default class BucketPlanCommand extends BaseCommand {
  static override readonly description =
    "Show the ordered S3 control-plane requests for a bucket descriptor";

  static override readonly examples = [
    {
      description: "List the operations in order",
      command: "<%= config.bin %> <%= command.id %> file://buckets/access-logs.json",
    },
    {
      description: "Print each request with its input as JSON Lines",
      command: "<%= config.bin %> <%= command.id %> file://buckets/access-logs.json --format jsonl",
    },
  ];

  static override readonly args = BaseCommand.descriptorArgs;

  static override readonly flags = BaseCommand.commonFlags;

  /**
   * Execute the plan command
   *
   * @returns Promise resolving when the plan is printed
   */
  async run(): Promise<void> {
    const { args, flags } = await this.parse(BucketPlanCommand);
    const { config, result } = await this.runCompile(args.descriptor, flags, "plan descriptor");

    if (result.status === "rejected") {
      return this.reportRejection(result, config);
    }

    this.reportWarnings(result.warnings);
    this.createFormatter(config).plan(buildControlPlanePlan(result.bundle));
  }
}
