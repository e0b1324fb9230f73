export type Domain = 'legal' | 'financial';
