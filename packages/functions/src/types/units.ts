export type UnitDimension = 'volume' | 'weight' | 'temperature';
