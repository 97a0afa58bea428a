export * from './constants';
export * from './message';
export * from './size';
export * from './versioned';
