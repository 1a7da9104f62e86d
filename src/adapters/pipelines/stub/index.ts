export * from './stub-pipelines';
