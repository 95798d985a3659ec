import { createLogger } from '@adsift/logger'

export const logger = createLogger('crawler')
