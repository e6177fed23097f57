import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RENDERER_BACKEND_IDS, buildPreferenceChain, createRenderer, isRendererBackendId } from '../createRenderer';
import { createDrawableRenderer } from '../renderers/createDrawableRenderer';
import { createRecordingPrimitives } from '../renderers/__tests__/recordingPrimitives';

const rendererFor = (backend: string) => createDrawableRenderer(createRecordingPrimitives(backend));

beforeEach(() => {
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildPreferenceChain', () => {
  it('uses the default order without a preference', () => {
    expect(buildPreferenceChain()).toEqual(['canvas2d', 'svg', 'webgpu']);
  });

  it('moves the preferred backend to the front without duplicating it', () => {
    expect(buildPreferenceChain('webgpu')).toEqual(['webgpu', 'canvas2d', 'svg']);
    expect(buildPreferenceChain('canvas2d')).toEqual(['canvas2d', 'svg', 'webgpu']);
  });

  it('ignores unknown ids', () => {
    expect(buildPreferenceChain('opengl')).toEqual(['canvas2d', 'svg', 'webgpu']);
    expect(isRendererBackendId('opengl')).toBe(false);
    expect(isRendererBackendId('svg')).toBe(true);
  });

  it('keeps the default order immutable', () => {
    expect(Object.isFrozen(RENDERER_BACKEND_IDS)).toBe(true);
  });
});

describe('createRenderer', () => {
  it('falls through a throwing first choice and never reaches the third', () => {
    const canvas2d = vi.fn(() => {
      throw new Error('no 2d context');
    });
    const svg = vi.fn(() => rendererFor('svg'));
    const webgpu = vi.fn(() => rendererFor('webgpu'));
    const onBackendFailure = vi.fn();

    const renderer = createRenderer(undefined, { canvas2d, svg, webgpu }, { onBackendFailure });

    expect(renderer?.backend).toBe('svg');
    expect(webgpu).not.toHaveBeenCalled();
    expect(onBackendFailure).toHaveBeenCalledTimes(1);
    expect(onBackendFailure).toHaveBeenCalledWith('canvas2d', new Error('no 2d context'));
  });

  it('invokes only the preferred backend when it succeeds', () => {
    const canvas2d = vi.fn(() => rendererFor('canvas2d'));
    const svg = vi.fn(() => rendererFor('svg'));
    const webgpu = vi.fn(() => rendererFor('webgpu'));

    expect(createRenderer('webgpu', { canvas2d, svg, webgpu })?.backend).toBe('webgpu');
    expect(canvas2d).not.toHaveBeenCalled();
    expect(svg).not.toHaveBeenCalled();
  });

  it('treats an empty result as a failure', () => {
    const onBackendFailure = vi.fn();
    const renderer = createRenderer(
      'svg',
      { svg: () => null, canvas2d: () => rendererFor('canvas2d') },
      { onBackendFailure }
    );

    expect(renderer?.backend).toBe('canvas2d');
    expect(onBackendFailure).toHaveBeenCalledWith('svg', expect.any(Error));
  });

  it('skips unregistered backends without reporting them', () => {
    const onBackendFailure = vi.fn();
    expect(createRenderer('canvas2d', { webgpu: () => rendererFor('webgpu') }, { onBackendFailure })?.backend).toBe(
      'webgpu'
    );
    expect(onBackendFailure).not.toHaveBeenCalled();
  });

  it('returns null when every backend fails', () => {
    const onBackendFailure = vi.fn();
    const renderer = createRenderer(
      null,
      {
        canvas2d: () => undefined,
        svg: () => {
          throw new Error('not an svg');
        },
      },
      { onBackendFailure }
    );

    expect(renderer).toBeNull();
    expect(onBackendFailure.mock.calls.map(([id]) => id)).toEqual(['canvas2d', 'svg']);
    expect(console.warn).toHaveBeenCalledTimes(2);
  });

  it('returns null with no backends', () => {
    expect(createRenderer('svg', {})).toBeNull();
  });
});
