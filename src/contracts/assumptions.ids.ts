export const ASSUMPTION_IDS = {
  // Thermal properties
  AVERAGE_HEAT_CAPACITY: 'thermal.average_heat_capacity',
  SOLIDS_SPECIFIC_HEAT: 'thermal.solids_specific_heat',

  // Units
  CONVERTED_FROM_METRIC: 'units.converted_from_metric',

  // Climate
  GROUND_FROM_AIR_TEMP: 'climate.ground_from_air_temp',

  // Correction coefficient
  LAMBDA_TWO_DECIMALS: 'lambda.two_decimal_rounding',
  PERMAFROST_RATIO: 'lambda.permafrost_ratio',

  // Result
  DEGENERATE_RESULT: 'result.degenerate',
} as const;

export type AssumptionId = typeof ASSUMPTION_IDS[keyof typeof ASSUMPTION_IDS];
