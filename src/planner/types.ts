/** Task names that may run concurrently. */
export type Stage = readonly string[];

/** Ordered stages; stage i+1 starts only after every task of stage i has finished. */
export type WorkflowPlan = readonly Stage[];
