export * from './error-reporting.interceptor';
