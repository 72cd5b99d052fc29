import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TagUploadModule } from "../../tag-upload/tag-upload.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
    }),
    TagUploadModule,
  ],
})
export class AppModule {}
