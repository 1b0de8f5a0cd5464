export * from './mood';
export * from './trust';
export * from './tags';
