// 21 distinct colours, from https://sashamaps.net/docs/resources/20-colors/
export const PARTY_COLORS = [
  '#e6194b',
  '#3cb44b',
  '#ffe119',
  '#0082c8',
  '#f58230',
  '#911eb4',
  '#46f0f0',
  '#f032e6',
  '#d2f53c',
  '#fabed4',
  '#008080',
  '#dcbeff',
  '#aa6e28',
  '#fffac8',
  '#800000',
  '#aaffc3',
  '#808000',
  '#ffd7b4',
  '#000080',
  '#808080',
  '#ffffff',
] as const;

export type PartyColor = (typeof PARTY_COLORS)[number];

export const PARTY_SYMBOL_WITH_SELF = '★';
export const PARTY_SYMBOL = '■';
