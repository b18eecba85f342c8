export * from './constants';
export * from './enums';
export * from './errors';
export * from './response';
