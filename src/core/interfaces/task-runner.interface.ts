export type BackgroundTask = () => Promise<void>;

/**
 * Executes work off the request path
 */
export interface TaskRunner {
  /**
   * Enqueue a task and return immediately
   */
  submit(name: string, task: BackgroundTask): void;

  /**
   * Resolves once the queue is empty and no task is running
   */
  onIdle(): Promise<void>;
}
