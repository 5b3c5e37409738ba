/**
 * @module bucket/validate
 * Bucket descriptor validation command
 *
 * Runs the full compiler and reports every violation without printing the
 * bundle. Exits with status 1 when the descriptor is rejected.
 *
 */

import { BaseCommand } from "../base-command.js";

/**
 * Validate a bucket descriptor and list its violations
 *
 * @public
 */
export default class BucketValidateCommand extends BaseCommand {
  static override readonly description = "Validate a bucket descriptor and list its violations";

  static override readonly examples = [
    {
      description: "Validate a descriptor file",
      command: "<%= config.bin %> <%= command.id %> file://buckets/access-logs.json",
    },
    {
      description: "Validate inline JSON and print violations as JSON",
      command: `<%= config.bin %> <%= command.id %> '{"name":"access-logs"}' --format json`,
    },
    {
      description: "Treat warnings as errors",
      command: "<%= config.bin %> <%= command.id %> file://buckets/access-logs.json --fail-on-warnings",
    },
  ];

  static override readonly args = BaseCommand.descriptorArgs;

  static override readonly flags = BaseCommand.commonFlags;

  /**
   * Execute the validate command
   *
   * @returns Promise resolving when the report is printed
   */
  async run(): Promise<void> {
    const { args, flags } = await this.parse(BucketValidateCommand);
    const { config, result } = await this.runCompile(args.descriptor, flags, "validate descriptor");

    if (result.status === "rejected") {
      return this.reportRejection(result, config);
    }

    this.createFormatter(config).violations(result.warnings);
    if (config.format === "table") {
      this.log(`Bucket descriptor "${result.name}" is valid`);
    }
  }
}
