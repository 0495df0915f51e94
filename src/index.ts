export * from './geocode';
