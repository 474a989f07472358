import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class HomeService {
  constructor(private configService: ConfigService<AllConfigType>) {}

  appInfo() {
    return {
      name: this.configService.get('app.name', { infer: true }),
      version: this.configService.get('app.version', { infer: true }),
      description:
        'Reads medical card images with a vision model and exports the fields to Excel',
    };
  }
}
