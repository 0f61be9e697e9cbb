import { Module } from "@nestjs/common";
import { FadeModule } from "../fade/fade.module";
import { FadeCommandService } from "./fade-command.service";

@Module({
  imports: [FadeModule],
  providers: [FadeCommandService],
  exports: [FadeCommandService],
})
export class CliModule {}
