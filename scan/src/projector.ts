/**
 * Batch projector: decoded samples to output rows, one row per sample.
 */

import { parameterName, surfaceLabel, unitOf } from './catalog.js';
import { disciplineName, gridParameterName, surfaceName } from './grid-names.js';
import type { DecodedSample, GridFileRow, OutputRow, ResourceDescriptor } from './types.js';

/**
 * Rebase a longitude from [0, 360) to (-180, 180]. Values already in
 * (-180, 180] come back unchanged.
 */
export function projectLongitude(longitude: number): number {
  return longitude > 180 ? longitude - 360 : longitude;
}

export function projectSample(sample: DecodedSample, resource: ResourceDescriptor): OutputRow {
  const variable = parameterName(sample.discipline, sample.parameterCategory, sample.parameterNumber);
  return {
    latitude: sample.latitude,
    longitude: projectLongitude(sample.longitude),
    value: sample.value,
    unit: unitOf(variable),
    variable,
    level: surfaceLabel(sample.surfaceType, sample.surfaceValue),
    forecast_hour: resource.forecastHour,
    run_date: resource.runDate,
    run_hour: resource.runHour,
  };
}

export function projectBatch(samples: readonly DecodedSample[], resource: ResourceDescriptor): OutputRow[] {
  return samples.map(sample => projectSample(sample, resource));
}

/**
 * Row of the grid file reader. Longitudes are not rebased.
 */
export function projectGridSample(sample: DecodedSample, fileIndex: number): GridFileRow {
  return {
    latitude: sample.latitude,
    longitude: sample.longitude,
    value: sample.value,
    discipline: disciplineName(sample.discipline),
    surface: surfaceName(sample.surfaceType),
    parameter: gridParameterName(sample.discipline, sample.parameterCategory, sample.parameterNumber),
    forecast_time: sample.forecastTime,
    surface_value: sample.surfaceValue,
    message_index: sample.messageIndex,
    file_index: fileIndex,
  };
}
