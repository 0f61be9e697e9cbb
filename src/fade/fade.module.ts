import { Module } from "@nestjs/common";
import { Mp3CodecModule } from "../mp3-codec/mp3-codec.module";
import { FadePipelineService } from "./fade-pipeline.service";

@Module({
  imports: [Mp3CodecModule],
  providers: [FadePipelineService],
  exports: [FadePipelineService],
})
export class FadeModule {}
