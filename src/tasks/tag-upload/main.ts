import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { HttpExceptionFilter } from "../../common/filters/http-exception.filter";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.useGlobalFilters(new HttpExceptionFilter());
  app.enableShutdownHooks();

  const port = app.get(ConfigService).get<number>("PORT", 3000);
  await app.listen(port);
  Logger.log(`Tag upload service listening on port ${port}`, "Bootstrap");
}

bootstrap().catch((error: unknown) => {
  Logger.error("Failed to start tag upload service", error, "Bootstrap");
  process.exit(1);
});
