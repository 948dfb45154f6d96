export const MIN_STYLE = 0;
export const MAX_STYLE = 21;
export const DEFAULT_STYLE = 1;

export const STYLE_OPTIONS: Readonly<Record<number, string>> = {
  0: 'Unknown',
  1: 'Waypoint',
  2: 'Airfield (grass)',
  3: 'Outlanding',
  4: 'Gliding airfield',
  5: 'Airfield (solid)',
  6: 'Mountain Pass',
  7: 'Mountain Top',
  8: 'Transmitter Mast',
  9: 'VOR',
  10: 'NDB',
  11: 'Cooling Tower',
  12: 'Dam',
  13: 'Tunnel',
  14: 'Bridge',
  15: 'Power Plant',
  16: 'Castle',
  17: 'Intersection',
  18: 'Marker',
  19: 'Reporting Point',
  20: 'PG Take Off',
  21: 'PG Landing'
};

export function styleLabel(style: number): string {
  return STYLE_OPTIONS[style] ?? `Style ${style}`;
}
