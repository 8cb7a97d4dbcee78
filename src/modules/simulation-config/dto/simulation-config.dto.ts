import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsISO8601,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsPositive,
  IsString,
  Matches,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import Decimal from 'decimal.js';

const ASSET_PAIR_PATTERN = /^[^/\s]+\/[^/\s]+$/;

export class ReplayConfigDto {
  @IsISO8601()
  startTime!: string;

  @IsOptional()
  @IsPositive()
  speed?: number = 1;
}

export class SimulationConfigDto {
  @IsString()
  @IsNotEmpty()
  currency!: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  notionalAssets?: string[] = [];

  @IsOptional()
  @IsObject()
  startingBalances?: Record<string, string | number> = {};

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  @Matches(ASSET_PAIR_PATTERN, {
    each: true,
    message: 'each value in pairs must look like QUANTITY/NOTIONAL',
  })
  pairs!: string[];

  @IsOptional()
  @IsInt()
  @IsPositive()
  barDurationMs?: number;

  @IsOptional()
  @IsInt()
  @IsPositive()
  refreshIntervalMs?: number;

  @IsString()
  @IsNotEmpty()
  barsFile!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => ReplayConfigDto)
  replay?: ReplayConfigDto;

  /**
   * Rules spanning several fields, run after the decorators.
   * Returns one message per violation.
   */
  static validateConsistency(dto: SimulationConfigDto): string[] {
    const errors: string[] = [];
    const notional = new Set([dto.currency, ...(dto.notionalAssets ?? [])]);

    for (const pair of dto.pairs) {
      const [, notionalAsset] = pair.split('/');
      if (!notional.has(notionalAsset)) {
        errors.push(
          `pairs: ${pair} is quoted in ${notionalAsset}, which is not a notional asset`,
        );
      }
    }

    for (const [asset, value] of Object.entries(dto.startingBalances ?? {})) {
      if (!isDecimal(value)) {
        errors.push(
          `startingBalances.${asset}: must be a decimal number, got "${String(value)}"`,
        );
      }
    }

    return errors;
  }
}

function isDecimal(value: unknown): boolean {
  if (typeof value !== 'string' && typeof value !== 'number') {
    return false;
  }
  try {
    return new Decimal(value).isFinite();
  } catch {
    return false;
  }
}
