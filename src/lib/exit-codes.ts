export const ExitCode = {
  Success: 0,
  Fatal: 1,
  Partial: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
