import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate, ValidationError } from 'class-validator';
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';

import { ConfigValidationError } from '../../common/errors';
import { AssetPair } from '../../common/types';
import { FinancialDecimal } from '../../common/utils';
import {
  BarFixture,
  BarRecord,
  DEFAULT_BAR_DURATION_MS,
  DEFAULT_REFRESH_INTERVAL_MS,
} from '../../connectors/simulated';
import { SimulationConfigDto } from './dto/simulation-config.dto';
import { SimulationConfig } from './types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function flattenErrors(errors: ValidationError[], prefix = ''): string[] {
  const messages: string[] = [];
  for (const error of errors) {
    const property = prefix ? `${prefix}.${error.property}` : error.property;
    if (error.constraints) {
      messages.push(
        `${property}: ${Object.values(error.constraints).join(', ')}`,
      );
    }
    if (error.children && error.children.length > 0) {
      messages.push(...flattenErrors(error.children, property));
    }
  }
  return messages;
}

@Injectable()
export class SimulationConfigLoaderService implements OnModuleInit {
  private readonly logger = new Logger(SimulationConfigLoaderService.name);
  private config: SimulationConfig | null = null;

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    // Factories that need the config early may already have loaded it
    if (this.config === null) {
      await this.load();
    }
  }

  /** Reads, validates and caches the config file. Safe to call again to reload. */
  async load(): Promise<SimulationConfig> {
    const configPath = this.resolveConfigPath();
    const parsed = this.parseYaml(this.readFile(configPath), configPath);
    const dto = await this.validateConfig(parsed);
    const bars = this.loadBars(dto.barsFile);

    const config = this.toSimulationConfig(dto, bars);
    this.config = config;
    this.logger.log({
      message: `Simulation config loaded from ${configPath}`,
      timestamp: new Date().toISOString(),
      module: 'simulation-config',
      data: {
        currency: config.currency,
        pairs: config.pairs.map((pair) => pair.toString()),
        barDurationMs: config.barDurationMs,
        refreshIntervalMs: config.refreshIntervalMs,
        barSeries: Object.keys(bars).length,
        replay: config.replay !== null,
      },
    });
    return config;
  }

  getConfig(): SimulationConfig {
    if (this.config === null) {
      throw new ConfigValidationError('Simulation config has not been loaded', [
        'load() must complete before getConfig()',
      ]);
    }
    return this.config;
  }

  private resolveConfigPath(): string {
    const configPath = this.configService.get<string>(
      'SIMULATION_CONFIG_PATH',
      'config/simulation.yaml',
    );
    return path.resolve(process.cwd(), configPath);
  }

  private readFile(filePath: string): string {
    if (!fs.existsSync(filePath)) {
      throw new ConfigValidationError(
        `Simulation config file not found: ${filePath}`,
        [`File not found: ${filePath}`],
      );
    }
    return fs.readFileSync(filePath, 'utf-8');
  }

  private parseYaml(
    content: string,
    configPath: string,
  ): Record<string, unknown> {
    let result: unknown;
    try {
      result = yaml.load(content);
    } catch (error) {
      const message =
        error instanceof Error ? error.message : 'Unknown YAML parse error';
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: ${message}`,
        [message],
      );
    }
    if (!isRecord(result)) {
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: file is empty or does not contain a valid object`,
        ['YAML content is empty or not an object'],
      );
    }
    return result;
  }

  private async validateConfig(
    parsed: Record<string, unknown>,
  ): Promise<SimulationConfigDto> {
    const dto = plainToInstance(SimulationConfigDto, parsed);
    const allErrors = flattenErrors(await validate(dto));

    // Cross-field rules assume the per-field shape is valid
    if (allErrors.length === 0) {
      allErrors.push(...SimulationConfigDto.validateConsistency(dto));
    }

    if (allErrors.length > 0) {
      throw new ConfigValidationError(
        `Simulation config validation failed with ${allErrors.length} error(s)`,
        allErrors,
      );
    }
    return dto;
  }

  private loadBars(barsFile: string): BarFixture {
    const filePath = path.resolve(process.cwd(), barsFile);
    const content = this.readFile(filePath);

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigValidationError(
        `Failed to parse bars file ${filePath}: ${message}`,
        [message],
      );
    }

    if (!isRecord(parsed)) {
      throw new ConfigValidationError(`Invalid bars file ${filePath}`, [
        'Bars file must map asset pairs to arrays of bars',
      ]);
    }

    const fixture: Record<string, BarRecord[]> = {};
    const errors: string[] = [];
    for (const [symbol, rows] of Object.entries(parsed)) {
      if (!Array.isArray(rows)) {
        errors.push(`${symbol}: must be an array of bars`);
        continue;
      }
      fixture[symbol] = [];
      rows.forEach((row: unknown, index) => {
        const record = toBarRecord(row);
        if (record === null) {
          errors.push(
            `${symbol}[${index}]: expected { dateTime, open, high, low, close }`,
          );
        } else {
          fixture[symbol].push(record);
        }
      });
    }

    if (errors.length > 0) {
      throw new ConfigValidationError(
        `Bars file ${filePath} failed validation with ${errors.length} error(s)`,
        errors,
      );
    }
    return fixture;
  }

  private toSimulationConfig(
    dto: SimulationConfigDto,
    bars: BarFixture,
  ): SimulationConfig {
    const startingBalances = new Map(
      Object.entries(dto.startingBalances ?? {}).map(
        ([asset, value]) => [asset, new FinancialDecimal(value)] as const,
      ),
    );
    return {
      currency: dto.currency,
      notionalAssets: dto.notionalAssets ?? [],
      startingBalances,
      pairs: dto.pairs.map((pair) => AssetPair.parse(pair)),
      barDurationMs: dto.barDurationMs ?? DEFAULT_BAR_DURATION_MS,
      refreshIntervalMs: dto.refreshIntervalMs ?? DEFAULT_REFRESH_INTERVAL_MS,
      bars,
      replay: dto.replay
        ? {
            startTime: new Date(dto.replay.startTime),
            speed: dto.replay.speed ?? 1,
          }
        : null,
    };
  }
}

function isPrice(value: unknown): value is string | number {
  return typeof value === 'string' || typeof value === 'number';
}

function toBarRecord(row: unknown): BarRecord | null {
  if (!isRecord(row)) {
    return null;
  }
  const { dateTime, open, high, low, close } = row;
  if (
    typeof dateTime !== 'string' ||
    !isPrice(open) ||
    !isPrice(high) ||
    !isPrice(low) ||
    !isPrice(close)
  ) {
    return null;
  }
  return { dateTime, open, high, low, close };
}
