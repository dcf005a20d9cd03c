/**
 * CLI Commands Module
 *
 * Command-line interface for oo-cohesion. No configuration needed; a
 * `cohesion.config.json` in the analyzed directory overrides the defaults.
 *
 * Commands:
 * - analyze: Compute class metrics for a directory and print a report
 * - init: Write a documented default config file
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import cliProgress from 'cli-progress';
import * as fs from 'node:fs';
import * as path from 'node:path';

import { scanFiles } from '../engines/fileScanner.js';
import { createCohesionAnalyzer, type AnalysisProgress } from '../engines/cohesionAnalyzer.js';
import {
  sortAnalysis,
  isSortKey,
  SORT_KEYS,
  type CohesionAnalysis,
  type SortKey,
} from '../engines/cohesionAnalysis.js';
import type { ClassMetrics } from '../engines/classMetrics.js';
import {
  loadConfig,
  configExists,
  generateDefaultConfig,
  parseFileSize,
  type Config,
} from '../storage/config.js';
import { normalizePath, toRelativePath, CONFIG_FILE_NAME } from '../utils/paths.js';
import { isCohesionError, invalidOption } from '../errors/index.js';
import { getLogger, createLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeOptions {
  top?: string;
  sort?: string;
  includeTests?: boolean;
  maxFileSize?: string;
  json?: boolean;
  verbose?: boolean;
  logFile?: string;
}

interface InitOptions {
  force?: boolean;
}

/**
 * Effective settings of one `analyze` run: config file overlaid by flags
 */
export interface AnalyzeSettings {
  top: number;
  sort: SortKey;
  skipTestFiles: boolean;
  maxFileSize: number;
  include: string[];
  exclude: string[];
  concurrency?: number;
}

// ============================================================================
// Thresholds
// ============================================================================

type Severity = 'ok' | 'warn' | 'bad';

/** LCOM above 1 means the class splits into unrelated parts */
function lcomSeverity(value: number): Severity {
  if (value > 3) return 'bad';
  if (value > 1) return 'warn';
  return 'ok';
}

function wmcSeverity(value: number): Severity {
  if (value > 30) return 'bad';
  if (value > 15) return 'warn';
  return 'ok';
}

function ditSeverity(value: number): Severity {
  if (value >= 5) return 'bad';
  if (value >= 4) return 'warn';
  return 'ok';
}

function nocSeverity(value: number): Severity {
  if (value >= 6) return 'bad';
  if (value >= 4) return 'warn';
  return 'ok';
}

export const SEVERITY = {
  lcom: lcomSeverity,
  wmc: wmcSeverity,
  dit: ditSeverity,
  noc: nocSeverity,
} as const;

function paint(text: string, severity: Severity): string {
  switch (severity) {
    case 'bad':
      return chalk.red.bold(text);
    case 'warn':
      return chalk.yellow(text);
    default:
      return text;
  }
}

// ============================================================================
// Output Formatters
// ============================================================================

/**
 * Print a styled header
 */
function printHeader(text: string): void {
  console.log('');
  console.log(chalk.cyan.bold(text));
  console.log(chalk.cyan('='.repeat(text.length)));
  console.log('');
}

function printSuccess(text: string): void {
  console.log(chalk.green('  ' + text));
}

function printError(text: string): void {
  console.log(chalk.red('  Error: ' + text));
}

function printWarning(text: string): void {
  console.log(chalk.yellow('  Warning: ' + text));
}

function printInfo(label: string, value: string | number): void {
  console.log(chalk.gray(`  ${label}: `) + chalk.white(String(value)));
}

function truncate(text: string, max: number): string {
  return text.length > max ? text.substring(0, max - 3) + '...' : text;
}

interface Column {
  header: string;
  align: 'left' | 'right';
  value: (cls: ClassMetrics, projectPath: string) => string;
  severity?: (cls: ClassMetrics) => Severity;
}

const COLUMNS: readonly Column[] = [
  { header: 'Class', align: 'left', value: (cls) => truncate(cls.className, 40) },
  {
    header: 'Path',
    align: 'left',
    value: (cls, projectPath) =>
      truncate(`${toRelativePath(cls.path, projectPath)}:${cls.startLine}`, 50),
  },
  {
    header: 'WMC',
    align: 'right',
    value: (cls) => String(cls.wmc),
    severity: (cls) => wmcSeverity(cls.wmc),
  },
  { header: 'CBO', align: 'right', value: (cls) => String(cls.cbo) },
  { header: 'RFC', align: 'right', value: (cls) => String(cls.rfc) },
  {
    header: 'LCOM',
    align: 'right',
    value: (cls) => String(cls.lcom),
    severity: (cls) => lcomSeverity(cls.lcom),
  },
  {
    header: 'DIT',
    align: 'right',
    value: (cls) => String(cls.dit),
    severity: (cls) => ditSeverity(cls.dit),
  },
  {
    header: 'NOC',
    align: 'right',
    value: (cls) => String(cls.noc),
    severity: (cls) => nocSeverity(cls.noc),
  },
  { header: 'Methods', align: 'right', value: (cls) => String(cls.nom) },
];

/**
 * Render the metrics table, one line per class plus a header and a rule
 *
 * Cells are padded before they are colored so that escape codes do not
 * shift the columns.
 */
export function formatMetricsTable(
  classes: readonly ClassMetrics[],
  projectPath: string
): string[] {
  const cells = classes.map((cls) => COLUMNS.map((col) => col.value(cls, projectPath)));
  const widths = COLUMNS.map((col, i) =>
    Math.max(col.header.length, ...cells.map((row) => row[i].length))
  );

  const pad = (text: string, i: number): string =>
    COLUMNS[i].align === 'right' ? text.padStart(widths[i]) : text.padEnd(widths[i]);

  const header = COLUMNS.map((col, i) => pad(col.header, i)).join('  ');
  const rule = widths.map((width) => '-'.repeat(width)).join('  ');

  const rows = classes.map((cls, rowIndex) =>
    COLUMNS.map((col, i) => {
      const text = pad(cells[rowIndex][i], i);
      return col.severity ? paint(text, col.severity(cls)) : text;
    }).join('  ')
  );

  return [chalk.bold(header), chalk.gray(rule), ...rows];
}

export const APPROXIMATION_NOTE =
  'CBO and RFC are syntactic approximations: type references and call sites are ' +
  'counted by name without resolving them.';

/**
 * Summary lines printed under the table
 */
export function formatSummary(analysis: CohesionAnalysis): string[] {
  const { summary } = analysis;
  return [
    `Classes: ${summary.totalClasses} in ${summary.totalFiles} files`,
    `Low cohesion (LCOM > 1): ${summary.lowCohesionCount}`,
    `WMC: avg ${summary.avgWMC.toFixed(2)}, max ${summary.maxWMC}`,
    `Max DIT: ${summary.maxDIT}`,
  ];
}

// ============================================================================
// Progress Bar Factory
// ============================================================================

/**
 * Create a progress bar for the analysis phase
 */
function createProgressBar(): cliProgress.SingleBar {
  return new cliProgress.SingleBar({
    format: '  Analyzing [{bar}] {percentage}% | {value}/{total} files | {filename}',
    barCompleteChar: '█',
    barIncompleteChar: '░',
    hideCursor: true,
    clearOnComplete: false,
  }, cliProgress.Presets.shades_classic);
}

/**
 * Progress callback that starts the bar on the first report
 */
function createCliProgressCallback(): {
  callback: (progress: AnalysisProgress) => void;
  cleanup: () => void;
} {
  let bar: cliProgress.SingleBar | null = null;

  const callback = (progress: AnalysisProgress): void => {
    const filename = truncate(path.basename(progress.path), 40);
    if (!bar) {
      bar = createProgressBar();
      bar.start(progress.total, 0, { filename });
    }
    bar.update(progress.processed, { filename });
  };

  const cleanup = (): void => {
    if (bar) {
      bar.update({ filename: 'done' });
      bar.stop();
      bar = null;
    }
  };

  return { callback, cleanup };
}

// ============================================================================
// Settings
// ============================================================================

function parsePositiveInt(option: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw invalidOption(option, `expected a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Overlay command-line flags on the loaded config
 *
 * @throws CohesionError INVALID_OPTION for a malformed flag value
 */
export function resolveAnalyzeSettings(config: Config, options: AnalyzeOptions): AnalyzeSettings {
  const top = options.top !== undefined ? parsePositiveInt('--top', options.top) : config.top;

  const sortValue = options.sort ?? config.sort;
  if (!isSortKey(sortValue)) {
    throw invalidOption('--sort', `expected one of ${SORT_KEYS.join(', ')}, got "${sortValue}"`);
  }

  let maxFileSize: number;
  const sizeValue = options.maxFileSize ?? config.maxFileSize;
  try {
    maxFileSize = parseFileSize(sizeValue);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalidOption('--max-file-size', message);
  }

  return {
    top,
    sort: sortValue,
    skipTestFiles: options.includeTests ? false : config.skipTestFiles,
    maxFileSize,
    include: config.include,
    exclude: config.exclude,
    concurrency: config.concurrency,
  };
}

/**
 * Scan and analyze a project root
 */
async function runAnalysis(
  projectPath: string,
  settings: AnalyzeSettings,
  onProgress?: (progress: AnalysisProgress) => void
): Promise<CohesionAnalysis> {
  const files = await scanFiles(projectPath, settings);
  return analyzeFiles(projectPath, files, settings, onProgress);
}

async function analyzeFiles(
  projectPath: string,
  files: string[],
  settings: AnalyzeSettings,
  onProgress?: (progress: AnalysisProgress) => void
): Promise<CohesionAnalysis> {
  const analyzer = createCohesionAnalyzer({
    projectRoot: projectPath,
    skipTestFiles: settings.skipTestFiles,
    maxFileSize: settings.maxFileSize,
    concurrency: settings.concurrency,
  });

  try {
    const analysis = await analyzer.analyzeProjectWithProgress(files, onProgress);
    return sortAnalysis(analysis, settings.sort);
  } finally {
    analyzer.close();
  }
}

// ============================================================================
// Command: analyze
// ============================================================================

/**
 * Route diagnostics for one run: stderr only with --verbose, plus the
 * --log-file when given
 */
export function configureLogging(options: Pick<AnalyzeOptions, 'verbose' | 'logFile'>): Logger {
  const logger = options.logFile ? createLogger({ filePath: options.logFile }) : getLogger();
  logger.setSilentConsole(!options.verbose);
  return logger;
}

/**
 * Analyze a directory and print the report
 */
async function analyzeCommand(target: string | undefined, options: AnalyzeOptions): Promise<void> {
  configureLogging(options);

  const projectPath = normalizePath(target ?? process.cwd());

  if (options.json) {
    try {
      const settings = resolveAnalyzeSettings(await loadConfig(projectPath), options);
      const analysis = await runAnalysis(projectPath, settings);
      console.log(JSON.stringify(toJsonReport(analysis, projectPath), null, 2));
    } catch (error) {
      const message = isCohesionError(error)
        ? error.userMessage
        : error instanceof Error ? error.message : String(error);
      console.log(JSON.stringify({ success: false, error: message }));
      process.exit(1);
    }
    return;
  }

  // Interactive mode
  printHeader('OO Cohesion - Class Metrics');

  const spinner = ora('Scanning files...').start();
  let progressHelper: ReturnType<typeof createCliProgressCallback> | null = null;

  try {
    const settings = resolveAnalyzeSettings(await loadConfig(projectPath), options);
    const files = await scanFiles(projectPath, settings);
    spinner.succeed(`Scanned ${chalk.cyan(projectPath)}: ${files.length.toLocaleString()} source files`);

    progressHelper = createCliProgressCallback();
    const analysis = await analyzeFiles(projectPath, files, settings, progressHelper.callback);
    progressHelper.cleanup();
    progressHelper = null;

    printReport(analysis, projectPath, settings);
  } catch (error) {
    progressHelper?.cleanup();
    if (spinner.isSpinning) {
      spinner.fail('Analysis failed');
    }
    handleError(error);
  }
}

function printReport(
  analysis: CohesionAnalysis,
  projectPath: string,
  settings: AnalyzeSettings
): void {
  console.log('');

  if (analysis.classes.length === 0) {
    console.log(chalk.yellow('  No classes found.'));
  } else {
    const shown = analysis.classes.slice(0, settings.top);
    for (const line of formatMetricsTable(shown, projectPath)) {
      console.log('  ' + line);
    }
    if (shown.length < analysis.classes.length) {
      console.log(
        chalk.gray(`  ... ${analysis.classes.length - shown.length} more (use --top to show more)`)
      );
    }
  }

  console.log('');
  console.log(chalk.white('━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━━'));
  for (const line of formatSummary(analysis)) {
    const [label, ...rest] = line.split(': ');
    printInfo(label, rest.join(': '));
  }
  console.log('');
  console.log(chalk.gray('  ' + APPROXIMATION_NOTE));

  if (analysis.skippedFiles.length > 0) {
    console.log('');
    printWarning(`${analysis.skippedFiles.length} files skipped`);
    for (const skipped of analysis.skippedFiles) {
      const relative = toRelativePath(skipped.path, projectPath);
      console.log(chalk.gray(`    - ${relative} (${skipped.reason}): ${skipped.message}`));
    }
  }
  console.log('');
}

/**
 * JSON form of an analysis, with paths relative to the project root
 */
export function toJsonReport(analysis: CohesionAnalysis, projectPath: string): object {
  return {
    success: true,
    projectPath,
    generatedAt: analysis.generatedAt.toISOString(),
    summary: analysis.summary,
    classes: analysis.classes.map((cls) => ({
      ...cls,
      path: toRelativePath(cls.path, projectPath),
    })),
    skippedFiles: analysis.skippedFiles.map((skipped) => ({
      ...skipped,
      path: toRelativePath(skipped.path, projectPath),
    })),
  };
}

// ============================================================================
// Command: init
// ============================================================================

/**
 * Write a default cohesion.config.json
 */
async function initCommand(target: string | undefined, options: InitOptions): Promise<void> {
  const projectPath = normalizePath(target ?? process.cwd());

  printHeader('OO Cohesion - Init');

  try {
    if (configExists(projectPath) && !options.force) {
      printWarning(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite it.`);
      console.log('');
      return;
    }

    const configPath = await generateDefaultConfig(projectPath);
    printSuccess(`Wrote ${configPath}`);
    console.log('');
  } catch (error) {
    handleError(error);
  }
}

// ============================================================================
// Error Handling
// ============================================================================

/**
 * Handle and display errors
 */
function handleError(error: unknown): void {
  console.log('');

  const debug = process.env.DEBUG || process.env.COHESION_DEBUG;

  if (isCohesionError(error)) {
    printError(error.userMessage);
    if (debug) {
      console.log(chalk.gray('  Developer: ' + error.developerMessage));
    }
  } else if (error instanceof Error) {
    printError(error.message);
    if (debug) {
      console.log(chalk.gray('  Stack: ' + error.stack));
    }
  } else {
    printError(String(error));
  }

  console.log('');
  console.log(chalk.gray('  For more details, run with DEBUG=1 environment variable'));
  console.log('');

  process.exit(1);
}

// ============================================================================
// CLI Program
// ============================================================================

/**
 * Create and configure the CLI program
 */
export function createCLI(): Command {
  const program = new Command();

  program
    .name('oo-cohesion')
    .description('CK class metrics (WMC, CBO, RFC, LCOM4, DIT, NOC) for object-oriented code')
    .version(getVersion(), '-v, --version', 'Show version number');

  program
    .command('analyze [path]')
    .description('Analyze classes under a directory (default: current directory)')
    .option('-n, --top <number>', 'Number of classes to show (default: 20)')
    .option('-s, --sort <key>', `Sort by one of: ${SORT_KEYS.join(', ')} (default: lcom)`)
    .option('--include-tests', 'Analyze test files too')
    .option('--max-file-size <size>', 'Skip files larger than this, e.g. "1MB" or "500KB"')
    .option('--json', 'Output results as JSON')
    .option('--verbose', 'Show detailed logging output')
    .option('--log-file <path>', 'Also write log entries to this file')
    .action(analyzeCommand);

  program
    .command('init [path]')
    .description(`Write a default ${CONFIG_FILE_NAME}`)
    .option('-f, --force', 'Overwrite an existing config file')
    .action(initCommand);

  return program;
}

/**
 * Get package version
 */
function getVersion(): string {
  try {
    const packageJsonPath = new URL('../../package.json', import.meta.url);
    const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

/**
 * Run the CLI
 */
export async function runCLI(args: string[]): Promise<void> {
  const program = createCLI();
  await program.parseAsync(args, { from: 'node' });
}
