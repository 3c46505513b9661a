import { z } from 'zod';
import type { FrostInputV1 } from '../schema/FrostInputV1';
import { ClimateDataUnavailableError } from '../errors';
import { PRECISION, roundHalfAwayFromZero } from '../utils/rounding';
import { computeGroundTempDifferential } from './ClimateDifferentialModule';

/**
 * SNAP Data API client (Scenarios Network for Alaska + Arctic Planning).
 *
 * Supplies projected mean annual air temperature and design freezing index
 * for a point, so the frost engine can be driven by downscaled climate
 * projections instead of historical station data.
 */

export const SNAP_API_BASE = 'https://earthmaps.io';

export interface SnapClimateAdapterOptions {
  baseUrl?: string;
  fetchFn?: typeof fetch;
}

export interface ProjectedTemperatureQuery {
  lat: number;
  lon: number;
  /** e.g. 'GFDL-CM3', 'NCAR-CCSM4'. */
  model: string;
  /** e.g. 'rcp45', 'rcp85'. */
  scenario: string;
  yearStart: number;
  yearEnd: number;
}

export interface DesignFreezingIndexQuery {
  lat: number;
  lon: number;
  model: string;
  /** e.g. '2040-2069'. */
  era: string;
}

// ─── Response shapes ──────────────────────────────────────────────────────────

/** Year key → value, or year key → { variable: value }. */
const YearlyValuesSchema = z.record(
  z.string(),
  z.union([z.number(), z.record(z.string(), z.number())]),
);

const TemperatureResponseSchema = z.record(z.string(), z.record(z.string(), YearlyValuesSchema));

const DesignIndexResponseSchema = z.record(
  z.string(),
  z.record(z.string(), z.object({ di: z.number() }).passthrough()),
);

async function getJson(url: string, quantity: string, options: SnapClimateAdapterOptions): Promise<unknown> {
  const fetchFn = options.fetchFn ?? fetch;
  const response = await fetchFn(url, { headers: { Accept: 'application/json' } });
  if (!response.ok) {
    throw new ClimateDataUnavailableError(
      quantity,
      `SNAP Data API request failed: ${response.status} ${response.statusText} (${url})`,
      response.status,
    );
  }
  try {
    return await response.json();
  } catch (err) {
    throw new ClimateDataUnavailableError(
      quantity,
      `SNAP Data API returned a body that is not JSON (${url}): ${err instanceof Error ? err.message : String(err)}`,
      response.status,
    );
  }
}

function parseOrThrow<S extends z.ZodTypeAny>(schema: S, body: unknown, quantity: string): z.infer<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ClimateDataUnavailableError(
      quantity,
      `Unexpected SNAP Data API response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
    );
  }
  return parsed.data;
}

function leafValues(value: number | Record<string, number>): number[] {
  return typeof value === 'number' ? [value] : Object.values(value);
}

/** °C → °F for absolute temperatures. */
function celsiusToFahrenheit(tempC: number): number {
  return tempC * 1.8 + 32;
}

// ─── Lookups ──────────────────────────────────────────────────────────────────

/**
 * Projected mean annual air temperature (°F, 1 dp) averaged over
 * `yearStart`–`yearEnd` inclusive.
 *
 * Year keys may carry a suffix ('2040_tas'); the leading part is the year.
 */
export async function fetchProjectedMeanAnnualTemp(
  query: ProjectedTemperatureQuery,
  options: SnapClimateAdapterOptions = {},
): Promise<number> {
  const baseUrl = options.baseUrl ?? SNAP_API_BASE;
  const url = `${baseUrl}/mmm/temperature/all/${query.lat}/${query.lon}`;
  const body = parseOrThrow(TemperatureResponseSchema, await getJson(url, 'meanAnnualTemp', options), 'meanAnnualTemp');

  const byScenario = body[query.model];
  if (!byScenario) {
    throw new ClimateDataUnavailableError('model', `No temperature projections for model '${query.model}'.`);
  }
  const yearly = byScenario[query.scenario];
  if (!yearly) {
    throw new ClimateDataUnavailableError(
      'scenario',
      `No temperature projections for scenario '${query.scenario}' under model '${query.model}'.`,
    );
  }

  const values: number[] = [];
  for (const [key, value] of Object.entries(yearly)) {
    const year = Number.parseInt(key.split('_')[0], 10);
    if (Number.isNaN(year) || year < query.yearStart || year > query.yearEnd) continue;
    values.push(...leafValues(value));
  }

  if (values.length === 0) {
    throw new ClimateDataUnavailableError(
      'yearRange',
      `No projected temperatures between ${query.yearStart} and ${query.yearEnd}.`,
    );
  }

  const meanC = values.reduce((sum, v) => sum + v, 0) / values.length;
  return roundHalfAwayFromZero(celsiusToFahrenheit(meanC), PRECISION.meanAnnualTempF);
}

/** Projected design freezing index (°F·days) for a model and era. */
export async function fetchDesignFreezingIndex(
  query: DesignFreezingIndexQuery,
  options: SnapClimateAdapterOptions = {},
): Promise<number> {
  const baseUrl = options.baseUrl ?? SNAP_API_BASE;
  const url = `${baseUrl}/design_index/freezing/all/point/${query.lat}/${query.lon}`;
  const body = parseOrThrow(DesignIndexResponseSchema, await getJson(url, 'airFreezingIndex', options), 'airFreezingIndex');

  const entry = body[query.model]?.[query.era];
  if (!entry) {
    throw new ClimateDataUnavailableError(
      'era',
      `No design freezing index for model '${query.model}' and era '${query.era}'.`,
    );
  }
  return entry.di;
}

// ─── Climate-driven input ─────────────────────────────────────────────────────

export interface ClimateFrostQuery {
  lat: number;
  lon: number;
  temperature: Omit<ProjectedTemperatureQuery, 'lat' | 'lon'>;
  freezingIndex: Omit<DesignFreezingIndexQuery, 'lat' | 'lon'>;
}

export type SoilAndSeasonInput = Pick<
  FrostInputV1,
  'thermalConductivity' | 'dryDensity' | 'waterContent' | 'waterContentFormat' | 'nFactor' | 'freezingSeasonDays'
>;

/**
 * Build an imperial `FrostInputV1` from SNAP projections plus site soil data.
 *
 * No ground temperature is available from the API, so v0 is taken from the
 * projected mean annual air temperature and the input is marked
 * `meanAnnualTempSource: 'air'`.
 */
export async function resolveClimateFrostInput(
  query: ClimateFrostQuery,
  soil: SoilAndSeasonInput,
  options: SnapClimateAdapterOptions = {},
): Promise<FrostInputV1> {
  const [meanAnnualTempF, designFreezingIndex] = await Promise.all([
    fetchProjectedMeanAnnualTemp({ lat: query.lat, lon: query.lon, ...query.temperature }, options),
    fetchDesignFreezingIndex({ lat: query.lat, lon: query.lon, ...query.freezingIndex }, options),
  ]);

  return {
    ...soil,
    unitSystem: 'imperial',
    meanAnnualTemp: computeGroundTempDifferential(meanAnnualTempF, 'imperial'),
    meanAnnualTempSource: 'air',
    airFreezingIndex: designFreezingIndex,
  };
}
