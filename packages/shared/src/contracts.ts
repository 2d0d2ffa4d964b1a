import { z } from 'zod';

export const AppErrorSchema = z.object({
  code: z.string(),
  message: z.string(),
  details: z.unknown().optional()
});
export type AppError = z.infer<typeof AppErrorSchema>;

// Structural corruption of the CSV; the path semantics stay untouched.
export const MalformedKind = z.enum(['missing_field', 'empty_path', 'extra_row', 'garbled']);
export type MalformedKind = z.infer<typeof MalformedKind>;

// Syntactically perfect CSV whose path field fails the consumer's path policy.
export const InvalidPathKind = z.enum(['relative', 'outside']);
export type InvalidPathKind = z.infer<typeof InvalidPathKind>;

export type Action =
  | { kind: 'valid' }
  | { kind: 'malformed'; error: MalformedKind }
  | { kind: 'invalidPath'; fail: InvalidPathKind }
  | { kind: 'truncate' }
  | { kind: 'quit' };

export const LogLevelName = z.enum(['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL']);
export type LogLevelName = z.infer<typeof LogLevelName>;

const requiredValue = z
  .string({ required_error: 'is required', invalid_type_error: 'must be a plain value' })
  .trim()
  .min(1, 'must not be empty');

/**
 * Shape of the INI file after `ini.parse`. Only the groups the generator reads are
 * validated; the uploader's other groups pass through untouched.
 */
export const IniConfigSchema = z
  .object({
    Directories: z
      .object({
        // Written verbatim into the comma-separated ledger.
        source_dir: requiredValue.refine((dir) => !/[,\r\n]/.test(dir), 'must not contain commas or line breaks'),
        csv_dir: requiredValue
      })
      .passthrough(),
    Files: z
      .object({
        csv_filename: requiredValue.refine((name) => !/[\\/]/.test(name), 'must be a file name, not a path')
      })
      .passthrough(),
    Logging: z
      .object({
        log_level: z
          .string()
          .trim()
          .transform((value) => value.toUpperCase())
          .pipe(LogLevelName)
          .optional()
      })
      .passthrough()
      .optional()
  })
  .passthrough();

export type GeneratorConfig = Readonly<{
  configPath: string;
  sourceDir: string;
  ledgerDir: string;
  ledgerFileName: string;
  ledgerFile: string;
  logLevel: LogLevelName | null;
}>;
