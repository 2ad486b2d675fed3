import { z } from 'zod';
import { DossierSetupError, type LogLevel } from '@dossier/common';

export const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DOSSIER_TEMPLATE_PATH: z.string().min(1).optional(),
  DOSSIER_PHOTOS_DIR: z.string().min(1).default('photos'),
  DOSSIER_OUTPUT_DIR: z.string().min(1).default('dossiers'),
  DOSSIER_ESCAPE_HTML: z.enum(['true', 'false']).default('false')
});

export type AppEnv = z.infer<typeof EnvSchema>;

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`).join('; ');

export const loadEnv = (input: Record<string, string | undefined> = process.env): AppEnv => {
  const parsed = EnvSchema.safeParse(input);
  if (!parsed.success) {
    throw new DossierSetupError('CONFIG_INVALID', describeIssues(parsed.error));
  }
  return parsed.data;
};

/** Options as they arrive from the command line; anything unset falls back to the environment. */
export interface CliRunOptions {
  input: string;
  template?: string;
  photos?: string;
  output?: string;
  escapeHtml?: boolean;
}

export interface DossierRunOptions {
  readonly inputPath: string;
  readonly templatePath: string;
  readonly photosDir: string;
  readonly outputDir: string;
  readonly escapeHtml: boolean;
  readonly logLevel: LogLevel;
}

export const resolveRunOptions = (
  cli: CliRunOptions,
  env: AppEnv,
  defaultTemplatePath: string
): DossierRunOptions => {
  if (cli.input.trim().length === 0) {
    throw new DossierSetupError('CONFIG_INVALID', 'input path is empty');
  }

  return Object.freeze({
    inputPath: cli.input,
    templatePath: cli.template ?? env.DOSSIER_TEMPLATE_PATH ?? defaultTemplatePath,
    photosDir: cli.photos ?? env.DOSSIER_PHOTOS_DIR,
    outputDir: cli.output ?? env.DOSSIER_OUTPUT_DIR,
    escapeHtml: cli.escapeHtml === true || env.DOSSIER_ESCAPE_HTML === 'true',
    logLevel: env.LOG_LEVEL
  });
};
