import { ConsoleLogger, LogLevel } from "@nestjs/common";

/**
 * Console logger that writes every level to stderr, leaving stdout to reports
 */
export class StderrLogger extends ConsoleLogger {
  protected printMessages(
    messages: unknown[],
    context?: string,
    logLevel?: LogLevel,
    _writeStreamType?: "stdout" | "stderr",
  ): void {
    super.printMessages(messages, context, logLevel, "stderr");
  }
}
