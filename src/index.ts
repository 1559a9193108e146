#!/usr/bin/env node
import { loadSettings } from './config/settings.js';
import { createLogger, resolveLoggingOptions } from './logger.js';
import { exitFatal, main } from './main.js';

const settings = loadSettings(process.env);
const logger = createLogger(resolveLoggingOptions(settings));

process.on('uncaughtException', (err) => {
  exitFatal(logger, err);
});

process.on('unhandledRejection', (reason) => {
  exitFatal(logger, reason);
});

void main(settings, logger);
