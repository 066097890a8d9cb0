/** One executable file in the task directory. */
export type TaskSpec = {
  name: string;
  dependsOn: string[];
};

export type TaskGraph = {
  /** Tasks in discovery order. */
  nodes: TaskSpec[];
};
