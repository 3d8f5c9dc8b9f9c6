export const queryKeys = {
  gitHistory: ["gitHistory"] as const,
};
