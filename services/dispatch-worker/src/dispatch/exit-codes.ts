// Process exit codes, a stable contract with the scheduler.
export const ExitCode = {
  Success: 0,
  RuntimeError: 1,
  ParseError: 2,
  ValidationError: 3,
  Timeout: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeName(code: ExitCode): string {
  const entry = Object.entries(ExitCode).find(([, value]) => value === code);
  return entry ? entry[0] : 'Unknown';
}
