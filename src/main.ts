import 'dotenv/config';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { AllConfigType } from './config/config.type';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    cors: true,
    bufferLogs: true,
  });
  const configService = app.get(ConfigService<AllConfigType>);
  app.useLogger(configService.getOrThrow('app.logLevels', { infer: true }));

  // Security headers
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          styleSrc: ["'self'", "'unsafe-inline'"],
          scriptSrc: ["'self'", "'unsafe-inline'", "'unsafe-eval'"], // Swagger UI needs unsafe-eval
          imgSrc: ["'self'", 'data:'],
          connectSrc: ["'self'"],
        },
      },
      frameguard: false,
      noSniff: true,
    }),
  );

  app.enableShutdownHooks();
  configureApp(app);

  // Swagger/OpenAPI documentation (disable with SWAGGER_ENABLED=false)
  const enableSwagger = process.env.SWAGGER_ENABLED !== 'false';

  if (enableSwagger) {
    const options = new DocumentBuilder()
      .setTitle('Medical Card Extractor')
      .setDescription(
        'Reads patient fields from medical card images and exports them to Excel',
      )
      .setVersion(configService.getOrThrow('app.version', { infer: true }))
      .build();

    const document = SwaggerModule.createDocument(app, options);
    SwaggerModule.setup('docs', app, document);

    Logger.log(
      `Swagger documentation available at http://localhost:${configService.getOrThrow('app.port', { infer: true })}/docs`,
      'Bootstrap',
    );
  }

  await app.listen(configService.getOrThrow('app.port', { infer: true }));
}
void bootstrap();
