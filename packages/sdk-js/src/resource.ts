import type { Attributes } from './types';
import { sanitizeAttributes } from './utils/attributes';

export const SDK_NAME = 'spanline';
export const SDK_LANGUAGE = 'nodejs';

/**
 * Attribute bundle describing the entity producing spans. Shared by every
 * span of one tracer provider; never mutated.
 */
export class Resource {
  readonly attributes: Readonly<Attributes>;

  constructor(attributes: Attributes = {}) {
    this.attributes = Object.freeze(sanitizeAttributes(attributes));
  }

  static empty(): Resource {
    return new Resource();
  }

  static default(): Resource {
    return new Resource({
      'service.name': 'unknown_service',
      'telemetry.sdk.name': SDK_NAME,
      'telemetry.sdk.language': SDK_LANGUAGE,
    });
  }

  /**
   * New resource with `other`'s attributes layered over this one's
   */
  merge(other?: Resource): Resource {
    if (!other) return this;
    return new Resource({ ...this.attributes, ...other.attributes });
  }
}
