export * from './availability';
export * from './catalog';
export * from './stats';
export * from './system';
