export * from './background-task-runner';
export * from './pipeline-executor';
