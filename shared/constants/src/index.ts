export * from './contract';
export * from './errorCodes';
export * from './transportModes';
