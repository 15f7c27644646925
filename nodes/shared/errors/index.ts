export * from './conversion.errors';
