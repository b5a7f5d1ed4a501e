import { AppConfig } from './config';
import { Logger, buildLogger } from './logger';
import { buildHCERTDecoder } from './decoder/service';
import { HCERTDecoder } from './decoder/scheme/hcert';
import { Validator } from './validator/service';

export * from './config';
export * from './logger';
export * from './decoder/types';
export * from './decoder/errors';
export * from './decoder/service';
export * from './decoder/scheme/hcert';
export { CertificateClaimsCodec } from './decoder/codec';
export { HeaderMap, extractEnvelope, readHeaderParameters, signatureInput } from './decoder/envelope';
export type { HeaderParameters } from './decoder/envelope';
export { materialize } from './decoder/materializer';
export type { ClaimsDecoder, JsonValue } from './decoder/materializer';
export * from './validator/rule';
export * from './validator/rules';
export * from './validator/service';

export type Services = {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly decoder: HCERTDecoder;
  readonly validator: Validator;
};

export function buildServices(config: AppConfig = new AppConfig()): Services {
  const logger = buildLogger({ level: config.logLevel });

  return {
    config,
    logger,
    decoder: buildHCERTDecoder(config, logger),
    validator: new Validator(logger.child({ module: 'validator' })),
  };
}
