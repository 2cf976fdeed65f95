import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";

async function bootstrap() {
  const logger = new Logger("Bootstrap");
  const app = await NestFactory.create(AppModule);

  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  const port = Number(app.get(ConfigService).get<number>("PORT", 4000));
  await app.listen(port);
  logger.log(`USSD gateway listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error("Failed to start application", error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
