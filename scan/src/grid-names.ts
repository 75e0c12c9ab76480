/**
 * Display names for the codes a grid file carries: discipline, surface type
 * and (discipline, category, number) parameter triples.
 *
 * The tables live in `data/grid-names.json` and are read on first use. A
 * parameter entry keyed `d/c/*` covers every number in that category.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { parseJSON } from '@gridscan/core';

const GridNamesSchema = z.object({
  unknown: z.string(),
  disciplines: z.record(z.string()),
  surfaces: z.record(z.string()),
  parameters: z.record(z.string()),
});

interface GridNames {
  unknown: string;
  disciplines: ReadonlyMap<string, string>;
  surfaces: ReadonlyMap<string, string>;
  parameters: ReadonlyMap<string, string>;
}

let cached: GridNames | undefined;

function names(): GridNames {
  if (cached === undefined) {
    const text = readFileSync(new URL('./data/grid-names.json', import.meta.url), 'utf8');
    const tables = parseJSON(text, GridNamesSchema);
    cached = {
      unknown: tables.unknown,
      disciplines: new Map(Object.entries(tables.disciplines)),
      surfaces: new Map(Object.entries(tables.surfaces)),
      parameters: new Map(Object.entries(tables.parameters)),
    };
  }
  return cached;
}

export function disciplineName(code: number): string {
  const tables = names();
  return tables.disciplines.get(String(code)) ?? tables.unknown;
}

export function surfaceName(code: number): string {
  const tables = names();
  return tables.surfaces.get(String(code)) ?? tables.unknown;
}

/**
 * @example
 * ```typescript
 * gridParameterName(0, 2, 2);   // 'U_Wind'
 * gridParameterName(0, 4, 192); // 'SW_Radiation'
 * ```
 */
export function gridParameterName(discipline: number, category: number, number: number): string {
  const { parameters, unknown } = names();
  return (
    parameters.get(`${discipline}/${category}/${number}`) ?? parameters.get(`${discipline}/${category}/*`) ?? unknown
  );
}
