import { getConfig, loadConfig, resetConfigCache, formatZodError } from '../src/config';
import { config as defaults } from '../src/config/config';
import { AppConfigSchema, type AppConfigInput } from '../src/config/schema';

function withTerrain(terrain: Partial<AppConfigInput['terrain']>, probe: Partial<AppConfigInput['probe']> = {}): AppConfigInput {
  return {
    ...defaults,
    terrain: { ...defaults.terrain, ...terrain },
    probe: { ...defaults.probe, ...probe },
  };
}

describe('getConfig', () => {
  beforeEach(() => {
    resetConfigCache();
  });

  it('should load the defaults with derived buffer sizes', () => {
    const config = getConfig();

    expect(config.terrain.chunkSize).toEqual({ x: 32, y: 32 });
    expect(config.derived).toEqual({
      verticesPerChunk: 1089,
      indicesPerChunk: 6144,
      vertexBufferBytes: 34848,
      indexBufferBytes: 24576,
      workgroupsPerChunk: 18,
      scanLimit: 6144,
      scanTruncates: false,
    });
  });

  it('should cache until reset', () => {
    const first = getConfig();
    expect(getConfig()).toBe(first);

    resetConfigCache();
    expect(getConfig()).not.toBe(first);
  });

  it('should freeze the whole tree', () => {
    const config = getConfig();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.terrain.chunkSize)).toBe(true);
    expect(Object.isFrozen(config.derived)).toBe(true);
  });
});

describe('loadConfig', () => {
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should flag chunks the fixed scan truncates', () => {
    const config = loadConfig(withTerrain({ chunkSize: { x: 40, y: 40 } }));

    expect(config.derived.indicesPerChunk).toBe(9600);
    expect(config.derived.workgroupsPerChunk).toBe(27);
    expect(config.derived.scanLimit).toBe(6144);
    expect(config.derived.scanTruncates).toBe(true);
  });

  it('should scan the whole chunk in buffer mode', () => {
    const config = loadConfig(withTerrain({ chunkSize: { x: 40, y: 40 } }, { scanMode: 'buffer' }));

    expect(config.derived.scanLimit).toBe(9600);
    expect(config.derived.scanTruncates).toBe(false);
  });

  it('should accept a zero-width height range', () => {
    expect(loadConfig(withTerrain({ minMaxHeight: { min: 2, max: 2 } })).terrain.minMaxHeight).toEqual({ min: 2, max: 2 });
  });

  it('should reject an inverted height range', () => {
    expect(() => loadConfig(withTerrain({ minMaxHeight: { min: 5, max: -5 } })))
      .toThrow('Configuration validation failed. See error details above.');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toContain('min must be less than or equal to max');
  });

  it('should reject a workgroup size of zero', () => {
    expect(() => loadConfig(withTerrain({ workgroupSize: 0 }))).toThrow('Configuration validation failed');
  });
});

describe('formatZodError', () => {
  it('should describe each issue by path', () => {
    const result = AppConfigSchema.safeParse({
      ...defaults,
      terrain: { ...defaults.terrain, workgroupSize: 'wide', extra: true },
    });

    expect(result.success).toBe(false);
    if (result.success) return;

    expect(formatZodError(result.error).split('\n')).toEqual([
      'Configuration validation failed:',
      '',
      '  ❌ terrain.workgroupSize:',
      '     Expected: number',
      '     Received: string',
      '',
      '  ❌ terrain:',
      '     Unrecognized keys: extra',
      '     (This may be a typo or unsupported field)',
      '',
      'Please fix the configuration and restart the server.',
    ]);
  });

  it('should label issues without a path as root', () => {
    const result = AppConfigSchema.safeParse(null);

    expect(result.success).toBe(false);
    if (result.success) return;

    expect(formatZodError(result.error)).toContain('  ❌ root:');
  });
});
