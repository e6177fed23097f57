import type { Renderer } from './renderers/createDrawableRenderer';

/** Default backend order: immediate canvas, then vector, then GPU. */
export const RENDERER_BACKEND_IDS = Object.freeze(['canvas2d', 'svg', 'webgpu'] as const);

export type RendererBackendId = (typeof RENDERER_BACKEND_IDS)[number];

/** Returns a renderer, or null/undefined when the backend cannot serve this host. May throw. */
export type RendererConstructor = () => Renderer | null | undefined;

/** Backends available in this environment. An absent entry is never attempted. */
export type RendererBackends = Partial<Record<RendererBackendId, RendererConstructor>>;

export interface CreateRendererOptions {
  /** Called once per backend that threw or produced nothing, in chain order. */
  readonly onBackendFailure?: (backend: RendererBackendId, reason: unknown) => void;
}

export const isRendererBackendId = (value: unknown): value is RendererBackendId =>
  typeof value === 'string' && RENDERER_BACKEND_IDS.some((id) => id === value);

/**
 * `preferred` first, then the default order without duplicates. Unknown ids fall back to the
 * default order.
 */
export function buildPreferenceChain(preferred?: string | null): RendererBackendId[] {
  const head = isRendererBackendId(preferred) ? [preferred] : [];
  return [...head, ...RENDERER_BACKEND_IDS.filter((id) => id !== preferred)];
}

/**
 * Walks the preference chain and returns the first renderer a registered backend produces, or
 * null when every backend fails. Backend failures never propagate.
 *
 * @example
 * ```typescript
 * const renderer = createRenderer('svg', {
 *   canvas2d: () => createCanvas2DRenderer({ canvas }),
 *   svg: () => createSvgRenderer({ svg }),
 * });
 * if (!renderer) showFallbackMessage();
 * ```
 */
export function createRenderer(
  preferred: string | null | undefined,
  backends: RendererBackends,
  options?: CreateRendererOptions
): Renderer | null {
  const fail = (backend: RendererBackendId, reason: unknown): void => {
    console.warn(`createRenderer: backend "${backend}" unavailable.`, reason);
    options?.onBackendFailure?.(backend, reason);
  };

  for (const id of buildPreferenceChain(preferred)) {
    const construct = backends[id];
    if (!construct) continue;
    try {
      const renderer = construct();
      if (renderer) return renderer;
      fail(id, new Error(`createRenderer: backend "${id}" returned no renderer.`));
    } catch (error) {
      fail(id, error);
    }
  }
  return null;
}
