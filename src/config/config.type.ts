import { AppConfig } from './app-config.type';
import { ThrottlerConfig } from './throttler-config.type';
import { CardExtractionConfig } from '../card-extraction/config/card-extraction-config.type';

export type AllConfigType = {
  app: AppConfig;
  throttler: ThrottlerConfig;
  cardExtraction: CardExtractionConfig;
};
