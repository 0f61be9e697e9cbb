import { Inject, Injectable, Logger } from "@nestjs/common";
import { once } from "events";
import { createReadStream, createWriteStream } from "fs";
import { fadeConfig, FadeConfig } from "../config/fade.config";
import { FadePipelineService } from "../fade/fade-pipeline.service";
import { FadeResult } from "../fade/types";
import { FadeCommand } from "./cli-args";

/**
 * Runs a parsed fade command against the file system
 */
@Injectable()
export class FadeCommandService {
  private readonly logger = new Logger(FadeCommandService.name);

  constructor(
    private readonly pipeline: FadePipelineService,
    @Inject(fadeConfig.KEY)
    private readonly config: FadeConfig,
  ) {}

  /**
   * Opens the input before creating the output, so a missing input leaves
   * no output file behind.
   * @throws FadeError, Mp3CodecError or a file system error; the output may
   * then hold the items written before the failure
   */
  async execute(command: FadeCommand): Promise<FadeResult> {
    const source = createReadStream(command.inputPath, {
      highWaterMark: this.config.readChunkSize,
    });
    await once(source, "open");

    const sink = createWriteStream(command.outputPath);
    // Nothing reads the source until the pipeline starts; hold its errors until then
    const sourceState: { error: Error | null } = { error: null };
    const onSourceError = (error: Error): void => {
      sourceState.error = error;
    };
    source.on("error", onSourceError);
    try {
      await once(sink, "open");
      if (sourceState.error) {
        throw sourceState.error;
      }
      this.logger.debug(`Fading ${command.inputPath} into ${command.outputPath}`);
      return await this.pipeline.run(source, sink, command.options);
    } catch (error) {
      source.destroy();
      sink.destroy();
      throw error;
    } finally {
      source.off("error", onSourceError);
    }
  }
}
