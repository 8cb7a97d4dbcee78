import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as yaml from 'js-yaml';
import * as path from 'path';
import { SimulationConfigLoaderService } from './simulation-config-loader.service';
import { ConfigValidationError } from '../../common/errors';

const mockExistsSync = vi.fn<(path: string) => boolean>();
const mockReadFileSync = vi.fn<(path: string, encoding: string) => string>();

vi.mock('fs', () => ({
  existsSync: (...args: [string]) => mockExistsSync(...args),
  readFileSync: (...args: [string, string]) => mockReadFileSync(...args),
}));

const CONFIG_PATH = path.resolve(process.cwd(), 'config/simulation.yaml');
const BARS_PATH = path.resolve(process.cwd(), 'data/bars.json');

const VALID_CONFIG = {
  currency: 'USD',
  notionalAssets: ['USDT'],
  startingBalances: { USD: '1000.50', BTC: 0.5 },
  pairs: ['BTC/USD', 'ETH/USDT'],
  barsFile: 'data/bars.json',
};

const VALID_BARS = {
  'BTC/USD': [
    {
      dateTime: '2025-12-17T18:27:00Z',
      open: '87000',
      high: '87100',
      low: '86900',
      close: '87050',
    },
  ],
};

function mockFiles(files: Record<string, string>): void {
  mockExistsSync.mockImplementation((filePath) => filePath in files);
  mockReadFileSync.mockImplementation((filePath) => {
    const content = files[filePath];
    if (content === undefined) {
      throw new Error(`unexpected read of ${filePath}`);
    }
    return content;
  });
}

function mockConfig(
  config: Record<string, unknown>,
  bars: unknown = VALID_BARS,
): void {
  mockFiles({
    [CONFIG_PATH]: yaml.dump(config),
    [BARS_PATH]: JSON.stringify(bars),
  });
}

async function createService(
  configOverrides: Record<string, string> = {},
): Promise<SimulationConfigLoaderService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      SimulationConfigLoaderService,
      {
        provide: ConfigService,
        useValue: {
          get: vi.fn(
            (key: string, defaultVal: string) =>
              configOverrides[key] ?? defaultVal,
          ),
        },
      },
    ],
  }).compile();

  return module.get<SimulationConfigLoaderService>(
    SimulationConfigLoaderService,
  );
}

async function loadError(
  service: SimulationConfigLoaderService,
): Promise<ConfigValidationError> {
  try {
    await service.load();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected load() to fail');
}

describe('SimulationConfigLoaderService', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('successful loading', () => {
    it('should load the config and apply default timings', async () => {
      mockConfig(VALID_CONFIG);
      const service = await createService();

      await service.onModuleInit();
      const config = service.getConfig();

      expect(config.currency).toBe('USD');
      expect(config.notionalAssets).toEqual(['USDT']);
      expect(config.pairs.map((pair) => pair.toString())).toEqual([
        'BTC/USD',
        'ETH/USDT',
      ]);
      expect(config.startingBalances.get('USD')?.toString()).toBe('1000.5');
      expect(config.startingBalances.get('BTC')?.toString()).toBe('0.5');
      expect(config.barDurationMs).toBe(60_000);
      expect(config.refreshIntervalMs).toBe(30_000);
      expect(config.replay).toBeNull();
      expect(config.bars).toEqual(VALID_BARS);
    });

    it('should read explicit timings and replay settings', async () => {
      mockConfig({
        ...VALID_CONFIG,
        barDurationMs: 300_000,
        refreshIntervalMs: 10_000,
        replay: { startTime: '2025-12-17T18:00:00Z' },
      });
      const service = await createService();

      const config = await service.load();

      expect(config.barDurationMs).toBe(300_000);
      expect(config.refreshIntervalMs).toBe(10_000);
      expect(config.replay?.startTime.toISOString()).toBe(
        '2025-12-17T18:00:00.000Z',
      );
      expect(config.replay?.speed).toBe(1);
    });

    it('should honour SIMULATION_CONFIG_PATH', async () => {
      const customPath = path.resolve(process.cwd(), 'custom/sim.yaml');
      mockFiles({
        [customPath]: yaml.dump(VALID_CONFIG),
        [BARS_PATH]: JSON.stringify(VALID_BARS),
      });
      const service = await createService({
        SIMULATION_CONFIG_PATH: 'custom/sim.yaml',
      });

      await service.load();

      expect(mockReadFileSync).toHaveBeenCalledWith(customPath, 'utf-8');
    });

    it('should not reload on module init once loaded', async () => {
      mockConfig(VALID_CONFIG);
      const service = await createService();

      await service.load();
      await service.onModuleInit();

      expect(mockReadFileSync).toHaveBeenCalledTimes(2);
    });
  });

  describe('file errors', () => {
    it('should fail when the config file is missing', async () => {
      mockFiles({});
      const service = await createService();

      const error = await loadError(service);

      expect(error.code).toBe(4010);
      expect(error.message).toBe(
        `Simulation config file not found: ${CONFIG_PATH}`,
      );
    });

    it('should fail on malformed YAML', async () => {
      mockFiles({ [CONFIG_PATH]: ': invalid: yaml: {{{}}}' });
      const service = await createService();

      const error = await loadError(service);

      expect(error.message).toMatch(/^Failed to parse YAML config at /);
    });

    it('should fail on an empty file', async () => {
      mockFiles({ [CONFIG_PATH]: '' });
      const service = await createService();

      const error = await loadError(service);

      expect(error.metadata).toEqual({
        validationErrors: ['YAML content is empty or not an object'],
      });
    });

    it('should fail when the bars file is missing', async () => {
      mockFiles({ [CONFIG_PATH]: yaml.dump(VALID_CONFIG) });
      const service = await createService();

      const error = await loadError(service);

      expect(error.message).toBe(`Simulation config file not found: ${BARS_PATH}`);
    });

    it('should report malformed bar rows', async () => {
      mockConfig(VALID_CONFIG, {
        'BTC/USD': [{ dateTime: '2025-12-17T18:27:00Z', open: 1 }],
        'ETH/USDT': 'none',
      });
      const service = await createService();

      const error = await loadError(service);

      expect(error.metadata).toEqual({
        validationErrors: [
          'BTC/USD[0]: expected { dateTime, open, high, low, close }',
          'ETH/USDT: must be an array of bars',
        ],
      });
    });
  });

  describe('validation', () => {
    it('should collect every field error', async () => {
      mockConfig({ barsFile: 'data/bars.json', barDurationMs: -5 });
      const service = await createService();

      const error = await loadError(service);
      const messages = error.metadata?.['validationErrors'];

      expect(messages).toEqual(
        expect.arrayContaining([
          expect.stringMatching(/^currency: /),
          expect.stringMatching(/^pairs: /),
          expect.stringMatching(/^barDurationMs: /),
        ]),
      );
    });

    it('should validate nested replay settings', async () => {
      mockConfig({ ...VALID_CONFIG, replay: { startTime: 'soon' } });
      const service = await createService();

      const error = await loadError(service);

      expect(error.metadata?.['validationErrors']).toEqual([
        expect.stringMatching(/^replay\.startTime: /),
      ]);
    });

    it('should reject pairs quoted in an unknown notional asset', async () => {
      mockConfig({ ...VALID_CONFIG, pairs: ['BTC/USD', 'ETH/EUR'] });
      const service = await createService();

      const error = await loadError(service);

      expect(error.message).toBe(
        'Simulation config validation failed with 1 error(s)',
      );
      expect(error.metadata).toEqual({
        validationErrors: [
          'pairs: ETH/EUR is quoted in EUR, which is not a notional asset',
        ],
      });
    });

    it('should reject non-numeric starting balances', async () => {
      mockConfig({ ...VALID_CONFIG, startingBalances: { USD: 'lots' } });
      const service = await createService();

      const error = await loadError(service);

      expect(error.metadata).toEqual({
        validationErrors: [
          'startingBalances.USD: must be a decimal number, got "lots"',
        ],
      });
    });
  });

  it('should refuse getConfig before load', async () => {
    const service = await createService();

    expect(() => service.getConfig()).toThrow(
      'Simulation config has not been loaded',
    );
  });
});
