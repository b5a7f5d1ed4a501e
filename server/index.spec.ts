import { isRight } from 'fp-ts/Either';

import { AppConfig, buildServices } from './index';
import { buildClaims, signClaims, vaccinationContent } from './decoder/testkit';

describe('buildServices', () => {
  const saved = { ...process.env };

  afterAll(() => {
    delete process.env.HCERT_PREFIX;
    delete process.env.LOG_LEVEL;
    Object.assign(process.env, saved);
  });

  it('should wire the decoder and validator from the config', () => {
    Object.assign(process.env, { HCERT_PREFIX: 'TEST1:', LOG_LEVEL: 'silent' });
    const { config, decoder, validator } = buildServices(new AppConfig());
    const { text } = signClaims(buildClaims(vaccinationContent()), { prefix: 'TEST1:' });

    expect(config.logLevel).toBe('silent');
    expect(decoder.isMatch(text)).toBe(true);

    const decoded = decoder.decode(text);
    if (!isRight(decoded)) throw decoded.left;

    const now = new Date('2026-06-01T12:00:00.000Z');
    expect(isRight(validator.evaluate(decoded.right, undefined, { now }))).toBe(true);
  });
});
