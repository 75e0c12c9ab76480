/**
 * @gridscan/scan - Catalog tests
 */

import { describe, it, expect } from 'vitest';
import {
  levelKey,
  normalizeLevel,
  normalizeVariable,
  parameterName,
  surfaceLabel,
  unitOf,
  variableKey,
} from '../catalog.js';

describe('normalizeVariable', () => {
  it('should resolve aliases case-insensitively', () => {
    expect(normalizeVariable('temperature')).toBe('TMP');
    expect(normalizeVariable('Temperature')).toBe('TMP');
    expect(normalizeVariable('humidity')).toBe('RH');
    expect(normalizeVariable('wind_u')).toBe('UGRD');
    expect(normalizeVariable('precip')).toBe('APCP');
  });

  it('should keep prefixed codes prefixed, uppercased', () => {
    expect(normalizeVariable('var_tmp')).toBe('var_TMP');
    expect(normalizeVariable('VAR_HGT')).toBe('var_HGT');
    expect(normalizeVariable('var_t')).toBe('var_T');
  });

  it('should not recognize bare codes or unknown names', () => {
    expect(normalizeVariable('TMP')).toBeUndefined();
    expect(normalizeVariable('ozone')).toBeUndefined();
    expect(normalizeVariable('var_')).toBeUndefined();
  });
});

describe('normalizeLevel', () => {
  it('should resolve aliases to level ids', () => {
    expect(normalizeLevel('2m')).toBe('2_m_above_ground');
    expect(normalizeLevel('10M')).toBe('10_m_above_ground');
    expect(normalizeLevel('sfc')).toBe('surface');
    expect(normalizeLevel('msl')).toBe('mean_sea_level');
  });

  it('should keep prefixed ids prefixed, lowercased', () => {
    expect(normalizeLevel('LEV_850_mb')).toBe('lev_850_mb');
    expect(normalizeLevel('lev_msl')).toBe('lev_msl');
  });

  it('should not recognize unknown names', () => {
    expect(normalizeLevel('stratosphere')).toBeUndefined();
    expect(normalizeLevel('lev_')).toBeUndefined();
  });
});

describe('query-string keys', () => {
  it('should render binding values as prefixed keys', () => {
    expect(variableKey('TMP')).toBe('var_TMP');
    expect(variableKey('temperature')).toBe('var_TMP');
    expect(levelKey('2m')).toBe('lev_2_m_above_ground');
    expect(levelKey('2_m_above_ground')).toBe('lev_2_m_above_ground');
    expect(levelKey('surface')).toBe('lev_surface');
  });

  it('should not resolve the suffix of a prefixed name as an alias', () => {
    expect(variableKey('var_T')).toBe('var_T');
    expect(variableKey(normalizeVariable('var_t') ?? '')).toBe('var_T');
    expect(levelKey('lev_msl')).toBe('lev_msl');
    expect(levelKey(normalizeLevel('LEV_MSL') ?? '')).toBe('lev_msl');
  });
});

describe('decoded codes', () => {
  it('should name known parameter triples', () => {
    expect(parameterName(0, 0, 0)).toBe('temperature');
    expect(parameterName(0, 1, 1)).toBe('humidity');
    expect(parameterName(0, 2, 2)).toBe('wind_u');
    expect(parameterName(0, 2, 3)).toBe('wind_v');
    expect(parameterName(10, 0, 0)).toBe('unknown');
  });

  it('should label surfaces', () => {
    expect(surfaceLabel(1, 0)).toBe('surface');
    expect(surfaceLabel(10, 0)).toBe('atmosphere');
    expect(surfaceLabel(100, 85000)).toBe('850hPa');
    expect(surfaceLabel(100, 92550)).toBe('925hPa');
    expect(surfaceLabel(101, 0)).toBe('msl');
    expect(surfaceLabel(103, 2)).toBe('2m');
    expect(surfaceLabel(103, 10.7)).toBe('10m');
    expect(surfaceLabel(200, 0)).toBe('unknown');
  });

  it('should report units, or null when none is on record', () => {
    expect(unitOf('temperature')).toBe('K');
    expect(unitOf('humidity')).toBe('%');
    expect(unitOf('wind_v')).toBe('m/s');
    expect(unitOf('unknown')).toBeNull();
  });
});
