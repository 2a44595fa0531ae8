const KIB = 1024;
const MIB = 1024 * KIB;
const GIB = 1024 * MIB;

const MAX_INPUT_BYTES_DEFAULT = 64 * MIB;

function resolveBoundedEnvInteger(
  envValue: string | undefined,
  defaults: {
    fallback: number;
    min: number;
    max: number;
  },
): number {
  if (envValue === undefined) {
    return defaults.fallback;
  }

  const trimmedValue = envValue.trim();

  if (trimmedValue.length === 0) {
    return defaults.fallback;
  }

  if (!/^[+-]?\d+$/u.test(trimmedValue)) {
    return defaults.fallback;
  }

  const parsedValue = Number.parseInt(trimmedValue, 10);

  if (parsedValue < defaults.min) {
    return defaults.min;
  }

  if (parsedValue > defaults.max) {
    return defaults.max;
  }

  return parsedValue;
}

function resolveEnvText(envValue: string | undefined): string | undefined {
  const trimmedValue = envValue?.trim();
  return trimmedValue || undefined;
}

export type InputRuntimeConfig = {
  inputPath?: string;
  maxInputBytes: number;
};

export function getInputRuntimeConfig(env: NodeJS.ProcessEnv = process.env): InputRuntimeConfig {
  return {
    inputPath: resolveEnvText(env.USAGE_INVOICING_INPUT),
    maxInputBytes: resolveBoundedEnvInteger(env.USAGE_INVOICING_MAX_INPUT_BYTES, {
      fallback: MAX_INPUT_BYTES_DEFAULT,
      min: KIB,
      max: GIB,
    }),
  };
}
