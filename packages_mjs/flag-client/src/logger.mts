import { createLogger } from '@flagwire/fetch-transport';

export const logger = createLogger('flag-client');
