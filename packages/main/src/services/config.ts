import { existsSync, readFileSync } from 'fs';
import { join, parse as parsePath, resolve } from 'path';
import { parse as parseIni } from 'ini';
import { err, ok, Result } from 'neverthrow';
import { IniConfigSchema, type AppError, type GeneratorConfig } from '../../../shared/src';
import { createAppError, toAppError } from '../errors';
import { logger } from '../logger';

export const CONFIG_FILE_NAME = 'config.ini';

// Config path policy: explicit option, then PCAPGEN_CONFIG_PATH, then ./config.ini.
export function getConfigPath(override?: string, cwd: string = process.cwd()): string {
  const explicit = override?.trim();
  if (explicit) return resolve(cwd, explicit);
  const fromEnv = process.env.PCAPGEN_CONFIG_PATH?.trim();
  if (fromEnv) return resolve(cwd, fromEnv);
  return join(cwd, CONFIG_FILE_NAME);
}

const safeParseIni = Result.fromThrowable(
  (raw: string) => parseIni(raw),
  (error) => toAppError(error)
);

function isFilesystemRoot(dir: string): boolean {
  return parsePath(dir).root === dir;
}

/**
 * Validates the INI text and turns it into the immutable config value handed to every
 * component. Relative directories resolve against `cwd`.
 */
export function parseGeneratorConfig(
  raw: string,
  configPath: string,
  cwd: string = process.cwd()
): Result<GeneratorConfig, AppError> {
  const parsedIni = safeParseIni(raw);
  if (parsedIni.isErr()) {
    return err(createAppError('config.parse', `Error parsing configuration file ${configPath}: ${parsedIni.error.message}`, { configPath }));
  }

  const checked = IniConfigSchema.safeParse(parsedIni.value);
  if (!checked.success) {
    const missing = checked.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    return err(
      createAppError('config.invalid', `Missing required configuration in ${configPath}: ${missing.join('; ')}`, {
        configPath,
        issues: missing
      })
    );
  }

  const { Directories, Files, Logging } = checked.data;
  const sourceDir = resolve(cwd, Directories.source_dir);
  const ledgerDir = resolve(cwd, Directories.csv_dir);
  if (isFilesystemRoot(sourceDir)) {
    return err(
      createAppError('config.invalid', `Directories.source_dir must not be a filesystem root (${sourceDir})`, {
        configPath,
        issues: ['Directories.source_dir must not be a filesystem root']
      })
    );
  }

  return ok(
    Object.freeze({
      configPath,
      sourceDir,
      ledgerDir,
      ledgerFileName: Files.csv_filename,
      ledgerFile: join(ledgerDir, Files.csv_filename),
      logLevel: Logging?.log_level ?? null
    })
  );
}

export function loadGeneratorConfig(configPath: string, cwd: string = process.cwd()): Result<GeneratorConfig, AppError> {
  if (!existsSync(configPath)) {
    return err(createAppError('config.missing', `Configuration file '${configPath}' not found.`, { configPath }));
  }

  let raw: string;
  try {
    raw = readFileSync(configPath, 'utf8');
  } catch (error) {
    return err(createAppError('config.parse', `Error reading configuration file ${configPath}`, toAppError(error)));
  }

  return parseGeneratorConfig(raw, configPath, cwd).map((config) => {
    logger.info({ file: configPath, sourceDir: config.sourceDir, ledgerFile: config.ledgerFile }, 'Config loaded');
    return config;
  });
}
