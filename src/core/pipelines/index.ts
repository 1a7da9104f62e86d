export * from './pipeline-registry';
