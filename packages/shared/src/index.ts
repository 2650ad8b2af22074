export * from './envConfig';
export * from './retries/backoff';
