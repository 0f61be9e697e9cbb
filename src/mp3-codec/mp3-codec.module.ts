import { Module } from "@nestjs/common";
import { MpegAudioCodecService } from "./mpeg-audio-codec.service";

@Module({
  providers: [MpegAudioCodecService],
  exports: [MpegAudioCodecService],
})
export class Mp3CodecModule {}
