// Public API

export * from './errors';
export * from './layout';
export * from './export';
export * from './config';
export { formatLayoutSummary, formatMonitorTable, formatInputSummary } from './report';
