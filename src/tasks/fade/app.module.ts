import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { CliModule } from "../../cli/cli.module";
import { fadeConfig } from "../../config/fade.config";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      load: [fadeConfig],
    }),
    CliModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
