import pino from 'pino';
import { loadEnv } from '../config/env-schema';

const { LOG_LEVEL } = loadEnv();

export const logger = pino({
  level: LOG_LEVEL,
  name: 'keyrange',
});

export type Logger = typeof logger;
