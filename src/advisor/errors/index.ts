export * from './types';
export { GracefulDegradation, describeFailure } from './gracefulDegradation';
