export { assertSafeConfiguration, enforcementStatus } from './safetyPolicy';
export type { SafetyFlags, EnforcementStatus } from './safetyPolicy';
export { evaluateEnforcement } from './enforcement';
export type { EnforcementResult } from './enforcement';
export { SpecFileGuard } from './specFileGuard';
export type { FileFingerprint } from './specFileGuard';
