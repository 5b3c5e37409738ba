/**
 * @module bucket/compile
 * Bucket descriptor compile command
 *
 * Prints the configuration bundle for an accepted descriptor. Warnings go
 * to stderr so the bundle on stdout stays parseable.
 *
 */

import { BaseCommand } from "../base-command.js";

/**
 * Compile a bucket descriptor into a configuration bundle
 *
 * @public
 */
export default class BucketCompileCommand extends BaseCommand {
  static override readonly description = "Compile a bucket descriptor into a configuration bundle";

  static override readonly examples = [
    {
      description: "Print a summary of the compiled bundle",
      command: "<%= config.bin %> <%= command.id %> file://buckets/access-logs.json",
    },
    {
      description: "Print the full bundle as JSON",
      command: "<%= config.bin %> <%= command.id %> file://buckets/access-logs.json --format json",
    },
    {
      description: "Compile with compiler debug logging",
      command: "<%= config.bin %> <%= command.id %> file://buckets/access-logs.json --verbose",
    },
  ];

  static override readonly args = BaseCommand.descriptorArgs;

  static override readonly flags = BaseCommand.commonFlags;

  /**
   * Execute the compile command
   *
   * @returns Promise resolving when the bundle is printed
   */
  async run(): Promise<void> {
    const { args, flags } = await this.parse(BucketCompileCommand);
    const { config, result } = await this.runCompile(args.descriptor, flags, "compile descriptor");

    if (result.status === "rejected") {
      return this.reportRejection(result, config);
    }

    this.reportWarnings(result.warnings);
    this.createFormatter(config).bundle(result.bundle);
  }
}
