import { expect } from 'vitest';
import type { WaveErrorKind, WaveResult } from '../../src';

interface WaveMatchers<R = unknown> {
  toFailWith(kind: WaveErrorKind): R;
}

declare module 'vitest' {
  interface Assertion<T = any> extends WaveMatchers<T> {}
  interface AsymmetricMatchersContaining extends WaveMatchers {}
}

expect.extend({
  toFailWith(received: WaveResult<unknown>, kind: WaveErrorKind) {
    const actual = received.ok ? 'success' : received.error.kind;
    const pass = actual === kind;

    return {
      pass,
      message: () => `expected result ${pass ? 'not ' : ''}to fail with ${kind}, got ${actual}`,
    };
  },
});
