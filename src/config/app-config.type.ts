import { LogLevel } from '@nestjs/common';

export type AppConfig = {
  nodeEnv: string;
  name: string;
  version: string;
  port: number;
  apiPrefix: string;
  logLevels: LogLevel[];
};
