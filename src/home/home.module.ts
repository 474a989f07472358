import { Module } from '@nestjs/common';
import { HomeService } from './home.service';
import { HomeController } from './home.controller';
import { HealthService } from './health.service';
import { ConfigModule } from '@nestjs/config';
import { CardExtractionModule } from '../card-extraction/card-extraction.module';

@Module({
  imports: [
    ConfigModule,
    // Vision model and spreadsheet ports for the health check
    CardExtractionModule,
  ],
  controllers: [HomeController],
  providers: [HomeService, HealthService],
})
export class HomeModule {}
