/**
 * FrostInputV1 – Canonical Schema
 *
 * The contract between the presentation shell and the frost-depth core.
 * Numeric fields are expressed in the declared `unitSystem`; the normalizer
 * converts metric input into the imperial working system before any
 * thermal physics runs.
 */

// ─── Units ────────────────────────────────────────────────────────────────────

/**
 * Declared unit system for a single call.
 *  - 'imperial': BTU/(hr·ft·°F), lb/ft³, °F, °F·days.  Frost depth in feet.
 *  - 'metric':   W/(m·K), kg/m³, °C, °C·days.  Frost depth in metres.
 */
export type UnitSystem = 'imperial' | 'metric';

/** How `waterContent` is expressed: 15 (percent) or 0.15 (fraction). */
export type WaterContentFormat = 'percent' | 'fraction';

/**
 * Provenance of `meanAnnualTemp`.
 *  - 'ground': measured or estimated mean annual ground temperature.
 *  - 'air':    mean annual air temperature used as a stand-in for the ground.
 */
export type MeanAnnualTempSource = 'ground' | 'air';

// ─── Canonical Input ──────────────────────────────────────────────────────────

export interface FrostInputV1 {
  unitSystem: UnitSystem;
  /** Defaults to 'percent'. */
  waterContentFormat?: WaterContentFormat;

  // ── Soil ──────────────────────────────────────────────────────────────────
  /** Average of frozen and unfrozen thermal conductivity (k). */
  thermalConductivity: number;
  /** Dry unit weight of the soil (γd). */
  dryDensity: number;
  /** Gravimetric water content (w). */
  waterContent: number;

  // ── Climate ───────────────────────────────────────────────────────────────
  /**
   * Mean annual ground temperature relative to freezing (v0), signed.
   * 8 means 8 degrees above freezing; −3 means permafrost-like conditions.
   */
  meanAnnualTemp: number;
  /** Defaults to 'ground'. */
  meanAnnualTempSource?: MeanAnnualTempSource;
  /** Seasonal cumulative degree-days below freezing in the air. */
  airFreezingIndex: number;
  /** Air-to-surface freezing index conversion factor (typically 0.7–1.0). */
  nFactor: number;
  /** Length of the freezing season in days. */
  freezingSeasonDays: number;
}

// ─── Working (imperial) values ────────────────────────────────────────────────

/**
 * Input after unit normalisation.  Every field is in the imperial working
 * system and water content is a fraction.
 */
export interface WorkingFrostInput {
  declaredUnitSystem: UnitSystem;
  meanAnnualTempSource: MeanAnnualTempSource;
  /** BTU/(hr·ft·°F) */
  thermalConductivity: number;
  /** lb/ft³ */
  dryDensity: number;
  /** Dimensionless fraction. */
  waterContentFraction: number;
  /** °F relative to 32 °F, signed. */
  meanAnnualTemp: number;
  /** °F·days */
  airFreezingIndex: number;
  nFactor: number;
  freezingSeasonDays: number;
}

// ─── Module results ───────────────────────────────────────────────────────────

export interface ThermalPropertiesResult {
  /** Volumetric latent heat of fusion L (BTU/ft³), rounded to 2 dp. */
  latentHeat: number;
  /** Average volumetric heat capacity C (BTU/(ft³·°F)), rounded to 2 dp. */
  heatCapacity: number;
}

export type DegenerateQuantity = 'airFreezingIndex' | 'freezingSeasonDays';

/**
 * Annotation for a freezing season that collapses vs to zero (or leaves it
 * undefined).  Not an error: frost depth is reported as 0.
 */
export interface DegeneracyV1 {
  kind: 'DegenerateInput';
  quantity: DegenerateQuantity;
  message: string;
}

export type DimensionlessParametersResult =
  | {
      status: 'defined';
      /** Surface freezing index F (°F·days). */
      surfaceFreezingIndex: number;
      /** Surface temperature depression vs (°F). */
      surfaceTempDepression: number;
      /** Fusion parameter μ, rounded to 3 dp. */
      fusionParameter: number;
      /** Thermal ratio α, rounded to 3 dp. */
      thermalRatio: number;
    }
  | {
      status: 'degenerate';
      surfaceFreezingIndex: number;
      /** Null when the season length is zero and vs has no value. */
      surfaceTempDepression: number | null;
      degeneracy: DegeneracyV1;
    };

export interface FreezingIndexSweepPoint {
  airFreezingIndex: number;
  frostDepth: number;
  /** Null at the degenerate (zero freezing index) point. */
  lambda: number | null;
}

export interface FreezingIndexSweepOptions {
  /** Upper bound of the sweep, in the input's declared unit system. */
  maxAirFreezingIndex: number;
  /** Number of intervals; the sweep returns steps + 1 points. */
  steps: number;
}
