import { logLevelSchema, optionalBooleanSchema, optionalNumberSchema } from './utils/schema.ts';

import type { z } from 'zod';

/** Client-wide configuration, read lazily from the environment. */
export class GtxConf {
  constructor(private env: { get(key: string): string | undefined }) {
    const { min, max } = this.delay;

    if (min > max) {
      throw new Error(`GTX_DELAY_MIN (${min}) cannot be greater than GTX_DELAY_MAX (${max}).`);
    }
  }

  /** Domain serving the `translate_a/single` endpoint. */
  get domain(): string {
    return this.env.get('GTX_DOMAIN') || 'translate.google.com';
  }

  /** Time limit of every outgoing request, in milliseconds. */
  get timeout(): number {
    return optionalNumberSchema.parse(this.env.get('GTX_TIMEOUT')) ?? 10_000;
  }

  /** Bounds of the random pause taken before each translation request, in milliseconds. */
  get delay(): { min: number; max: number } {
    return {
      min: optionalNumberSchema.parse(this.env.get('GTX_DELAY_MIN')) ?? 200,
      max: optionalNumberSchema.parse(this.env.get('GTX_DELAY_MAX')) ?? 500,
    };
  }

  /** `User-Agent` sent with every request. */
  get userAgent(): string {
    return this.env.get('GTX_USER_AGENT') ||
      'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:61.0) Gecko/20100101 Firefox/61.0';
  }

  /** Minimum level of emitted logs. */
  get logLevel(): z.infer<typeof logLevelSchema> {
    return logLevelSchema.parse(this.env.get('LOG_LEVEL') || 'info');
  }

  /** Cache settings. */
  get caches(): {
    translation: { enabled: boolean; max: number; ttl: number };
  } {
    const env = this.env;

    return {
      /** Translation result cache settings. */
      get translation(): { enabled: boolean; max: number; ttl: number } {
        return {
          enabled: optionalBooleanSchema.parse(env.get('GTX_CACHE_TRANSLATION_ENABLED')) ?? false,
          max: Number(env.get('GTX_CACHE_TRANSLATION_MAX') || 1000),
          ttl: Number(env.get('GTX_CACHE_TRANSLATION_TTL') || 6 * 60 * 60 * 1000),
        };
      },
    };
  }
}
