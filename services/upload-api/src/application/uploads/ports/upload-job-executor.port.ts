export type BackgroundTask = () => Promise<void>;

export type TaskAdmission = 'started' | 'queued' | 'caller-ran';

export const UPLOAD_JOB_EXECUTOR = Symbol('UPLOAD_JOB_EXECUTOR');

export interface UploadJobExecutorPort {
  /**
   * Hands a task to the executor. Resolves as soon as the task is accepted,
   * or after it has run when the executor is saturated.
   */
  submit(task: BackgroundTask): Promise<TaskAdmission>;
  onIdle(): Promise<void>;
}
