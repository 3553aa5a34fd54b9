export { normalizeProfile, contextLocation, inferSpecType, detectStrategy, extractRuntime } from './profileNormalizer';
export type { ExampleContext } from './profileNormalizer';
