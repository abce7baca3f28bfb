export * from './metric-record';
export * from './metric-series';
