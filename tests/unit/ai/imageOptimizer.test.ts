/**
 * ImageOptimizer Unit Tests
 *
 * Tests the sharp-based downscaling:
 * - Resize triggered when the frame exceeds max width
 * - No resize when the frame is within max width
 * - JPEG output with the requested quality
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

// =============================================================================
// Hoisted mocks
// =============================================================================

const { mockSharpInstance, mockSharp } = vi.hoisted(() => {
  const instance = {
    metadata: vi.fn(),
    resize: vi.fn(),
    jpeg: vi.fn(),
    toBuffer: vi.fn(),
  };
  return {
    mockSharpInstance: instance,
    mockSharp: vi.fn(() => instance),
  };
});

vi.mock('sharp', () => ({
  default: mockSharp,
}));

import { optimizeForModel } from '../../../src/ai/ImageOptimizer.js';

describe('optimizeForModel', () => {
  const input = Buffer.from('png-bytes');
  const output = Buffer.from('jpeg-bytes');

  beforeEach(() => {
    vi.clearAllMocks();
    // Chain returns self
    mockSharpInstance.resize.mockReturnValue(mockSharpInstance);
    mockSharpInstance.jpeg.mockReturnValue(mockSharpInstance);
    mockSharpInstance.toBuffer.mockResolvedValue({ data: output, info: { width: 1568, height: 882 } });
  });

  it('resizes frames wider than the default max width (1568)', async () => {
    mockSharpInstance.metadata.mockResolvedValue({ width: 2560, height: 1440 });

    const result = await optimizeForModel(input);

    expect(mockSharpInstance.resize).toHaveBeenCalledWith({ width: 1568, withoutEnlargement: true });
    expect(mockSharpInstance.jpeg).toHaveBeenCalledWith({ quality: 80 });
    expect(result).toEqual({ data: output, mediaType: 'image/jpeg', width: 1568, height: 882 });
  });

  it('does not resize frames within the max width', async () => {
    mockSharpInstance.metadata.mockResolvedValue({ width: 1280, height: 720 });

    await optimizeForModel(input);

    expect(mockSharpInstance.resize).not.toHaveBeenCalled();
  });

  it('uses custom max width and quality', async () => {
    mockSharpInstance.metadata.mockResolvedValue({ width: 1280, height: 720 });

    await optimizeForModel(input, { maxWidth: 800, quality: 60 });

    expect(mockSharpInstance.resize).toHaveBeenCalledWith({ width: 800, withoutEnlargement: true });
    expect(mockSharpInstance.jpeg).toHaveBeenCalledWith({ quality: 60 });
    expect(mockSharp).toHaveBeenCalledWith(input);
  });
});
