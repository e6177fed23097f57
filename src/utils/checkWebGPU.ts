/**
 * WebGPU support detection. The probe result is memoized.
 */

export interface WebGPUSupportResult {
  readonly supported: boolean;
  /** Why WebGPU is unusable; absent when supported. */
  readonly reason?: string;
}

let cachedSupportCheck: Promise<WebGPUSupportResult> | null = null;

const describeAdapterError = (error: unknown): string => {
  if (typeof DOMException !== 'undefined' && error instanceof DOMException) {
    return error.message ? `${error.name} - ${error.message}` : error.name;
  }
  return error instanceof Error ? error.message : String(error);
};

/**
 * Checks that `navigator.gpu` exists and grants an adapter. Tries the low-power adapter the GPU
 * backend requests, then the default one. Never rejects.
 *
 * @example
 * ```typescript
 * const { supported, reason } = await checkWebGPUSupport();
 * if (!supported) console.warn('WebGPU not available:', reason);
 * ```
 */
export function checkWebGPUSupport(): Promise<WebGPUSupportResult> {
  if (cachedSupportCheck) return cachedSupportCheck;

  cachedSupportCheck = (async (): Promise<WebGPUSupportResult> => {
    if (typeof window === 'undefined') {
      return { supported: false, reason: 'Not running in a browser environment (window is undefined).' };
    }
    if (typeof navigator === 'undefined') {
      return { supported: false, reason: 'Navigator is not available in this environment.' };
    }
    if (!navigator.gpu) {
      return { supported: false, reason: 'WebGPU API (navigator.gpu) is not available.' };
    }

    try {
      const adapter =
        (await navigator.gpu.requestAdapter({ powerPreference: 'low-power' })) ?? (await navigator.gpu.requestAdapter());
      if (!adapter) {
        return { supported: false, reason: 'No compatible WebGPU adapter found.' };
      }
      return { supported: true };
    } catch (error) {
      return { supported: false, reason: `Failed to request WebGPU adapter: ${describeAdapterError(error)}` };
    }
  })();

  return cachedSupportCheck;
}

/** Forgets the memoized probe so the next call checks again. */
export function resetWebGPUSupportCheck(): void {
  cachedSupportCheck = null;
}
