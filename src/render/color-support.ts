export function shouldUseColorByDefault(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.NO_COLOR !== undefined) {
    return false;
  }

  if (env.FORCE_COLOR !== undefined) {
    return env.FORCE_COLOR !== '0';
  }

  return process.stdout.isTTY === true;
}
