import { z } from 'zod';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

export type EnvSource = Record<string, string | undefined>;

export type LoadEnvConfigOptions = {
  env?: EnvSource;
  context?: string;
};

export class EnvConfigError extends Error {
  readonly code = 'ENV_CONFIG_INVALID';
  readonly issues: string[];

  constructor(context: string, issues: string[]) {
    const details = issues.map((issue) => `  - ${issue}`).join('\n');
    super(`[${context}] Invalid environment configuration\n${details}`);
    this.name = 'EnvConfigError';
    this.issues = issues;
  }
}

/**
 * Parses an environment bag with a zod schema built from the `*Var` helpers
 * below. Every failing variable is reported at once.
 */
export function loadEnvConfig<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, options?: LoadEnvConfigOptions): T {
  const envSource: EnvSource = { ...(options?.env ?? process.env) };
  const context = options?.context ?? 'loadgrid';

  const result = schema.safeParse(envSource);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
      return `${location}: ${issue.message}`;
    });
    throw new EnvConfigError(context, issues);
  }

  return result.data;
}

type CommonVarOptions<T> = {
  required?: boolean;
  defaultValue?: T;
  description?: string;
};

function describeVar(ctx: z.RefinementCtx, description?: string): string {
  if (description) {
    return description;
  }
  const name = ctx.path.length > 0 ? ctx.path[ctx.path.length - 1] : undefined;
  return name === undefined ? 'value' : String(name);
}

function isBlank(value: unknown): value is null | undefined | '' {
  return value === null || value === undefined || (typeof value === 'string' && value.trim() === '');
}

// Shared handling for unset variables: default, required issue, or undefined.
function resolveBlank<T>(ctx: z.RefinementCtx, options: CommonVarOptions<T> | undefined): T | undefined {
  if (options?.defaultValue !== undefined) {
    return options.defaultValue;
  }
  if (options?.required) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing required ${describeVar(ctx, options.description)}` });
    return z.NEVER;
  }
  return undefined;
}

function checkBounds(
  ctx: z.RefinementCtx,
  value: number,
  options: { min?: number; max?: number; description?: string } | undefined
): boolean {
  const description = describeVar(ctx, options?.description);
  if (options?.min !== undefined && value < options.min) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be >= ${options.min}` });
    return false;
  }
  if (options?.max !== undefined && value > options.max) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${description} must be <= ${options.max}` });
    return false;
  }
  return true;
}

export type BooleanVarOptions = CommonVarOptions<boolean>;

export function booleanVar(options?: BooleanVarOptions) {
  return z.union([z.string(), z.boolean()]).nullable().optional().transform((value, ctx): boolean | undefined => {
    if (isBlank(value)) {
      return resolveBlank<boolean>(ctx, options);
    }
    if (typeof value === 'boolean') {
      return value;
    }

    const normalized = value.trim().toLowerCase();
    if (TRUE_VALUES.includes(normalized)) {
      return true;
    }
    if (FALSE_VALUES.includes(normalized)) {
      return false;
    }

    const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Invalid ${describeVar(ctx, options?.description)}. Accepted boolean values: ${accepted}`
    });
    return z.NEVER;
  });
}

export type NumberVarOptions = CommonVarOptions<number> & {
  min?: number;
  max?: number;
};

export function integerVar(options?: NumberVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx): number | undefined => {
    if (isBlank(value)) {
      return resolveBlank<number>(ctx, options);
    }

    const parsed = typeof value === 'number' ? Math.trunc(value) : Number(value.trim());
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${describeVar(ctx, options?.description)} to be an integer`
      });
      return z.NEVER;
    }
    return checkBounds(ctx, parsed, options) ? parsed : z.NEVER;
  });
}

export function numberVar(options?: NumberVarOptions) {
  return z.union([z.string(), z.number()]).nullable().optional().transform((value, ctx): number | undefined => {
    if (isBlank(value)) {
      return resolveBlank<number>(ctx, options);
    }

    const parsed = typeof value === 'number' ? value : Number(value.trim());
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected ${describeVar(ctx, options?.description)} to be a number`
      });
      return z.NEVER;
    }
    return checkBounds(ctx, parsed, options) ? parsed : z.NEVER;
  });
}

export type StringVarOptions = CommonVarOptions<string> & {
  pattern?: RegExp;
  lowercase?: boolean;
};

export function stringVar(options?: StringVarOptions) {
  return z.string().nullable().optional().transform((value, ctx): string | undefined => {
    if (isBlank(value)) {
      const fallback = resolveBlank<string>(ctx, options);
      return typeof fallback === 'string' && options?.lowercase ? fallback.toLowerCase() : fallback;
    }

    const trimmed = value.trim();
    const normalized = options?.lowercase ? trimmed.toLowerCase() : trimmed;

    if (options?.pattern && !options.pattern.test(normalized)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `${describeVar(ctx, options.description)} does not match expected pattern`
      });
      return z.NEVER;
    }
    return normalized;
  });
}
