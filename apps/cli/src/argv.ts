export function normalizeArgv(rawArgv: string[]): string[] {
  // npm run forwards args as: node main.ts -- <args>
  if (rawArgv[2] === '--') {
    return [rawArgv[0], rawArgv[1], ...rawArgv.slice(3)];
  }
  return rawArgv;
}
