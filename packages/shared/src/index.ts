export * from './types/test-project';
export * from './types/error-report';
