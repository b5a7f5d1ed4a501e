import { AppConfig } from '../config';
import { Logger } from '../logger';
import { HCERTDecoder } from './scheme/hcert';

export function buildHCERTDecoder(config: AppConfig, logger: Logger): HCERTDecoder {
  return new HCERTDecoder(logger.child({ module: 'decoder' }), {
    prefix: config.prefix,
    maxInputLength: config.maxInputLength,
  });
}
