/** Logger.error 의 두 번째 인자로 넘길 stack 문자열. */
export function errorTrace(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return String(error);
}
