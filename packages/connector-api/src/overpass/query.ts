/**
 * Overpass QL helpers
 *
 * Builds the road query the sync job has always run against the
 * OpenStreetMap Overpass API: every way tagged `highway` inside a
 * named area, with its full geometry.
 */

function quote(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function buildRoadsQuery(areaName: string): string {
  return [
    `area["name"=${quote(areaName)}]->.a;`,
    '(',
    '  way(area.a)[highway];',
    ');',
    'out geom;',
  ].join('\n');
}

/**
 * Attach the query as the `data` parameter, replacing any existing one
 */
export function withOverpassQuery(url: string, areaName: string): string {
  const target = new URL(url);
  target.searchParams.set('data', buildRoadsQuery(areaName));
  return target.toString();
}
