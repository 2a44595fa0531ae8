export type EnvVarOverride = {
  name: string;
  value: string;
  description: string;
};

const ENV_VARS_TO_DISPLAY: Array<{ name: string; description: string }> = [
  { name: 'USAGE_INVOICING_INPUT', description: 'default input file' },
  { name: 'USAGE_INVOICING_MAX_INPUT_BYTES', description: 'maximum input file size' },
];

export function getActiveEnvVarOverrides(env: NodeJS.ProcessEnv = process.env): EnvVarOverride[] {
  const overrides: EnvVarOverride[] = [];

  for (const { name, description } of ENV_VARS_TO_DISPLAY) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      overrides.push({ name, value, description });
    }
  }

  return overrides;
}

export function formatEnvVarOverrides(overrides: EnvVarOverride[]): string[] {
  if (overrides.length === 0) {
    return [];
  }

  const lines: string[] = [];
  lines.push('Active environment overrides:');

  for (const { name, value, description } of overrides) {
    lines.push(`  ${name}=${value}  (${description})`);
  }

  return lines;
}
