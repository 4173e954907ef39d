export const QUEUE_NAMES = {
  EVALUATION: 'evaluation-queue',
} as const;

export const JOB_NAMES = {
  EVALUATE_DATE: 'evaluate-date',
} as const;

export interface EvaluationJobData {
  /** 'yesterday', 'today' or YYYY-MM-DD, resolved when the job runs */
  date: string;
}
