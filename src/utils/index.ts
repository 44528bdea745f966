export { logger, createChildLogger } from './logger.js';
export { AsyncChannel } from './channel.js';
export { normalizeWhitespace, domainOf } from './text.js';
export { GserpError, ConfigError, FetchError, InvalidRequestError, OutputError, errorMessage } from './errors.js';
