import pino from 'pino';

/**
 * Diagnostics go to stderr as JSON so they never mix with prompts.
 * The level is raised or lowered once the configuration is loaded.
 */
export const logger = pino({ name: 'unitwright', level: 'warn' }, pino.destination(2));
