#!/usr/bin/env node
import { readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import process from 'node:process';

import { isRingLabError } from '../errors.js';
import { loadProfileFromPath } from '../profile/loader.js';
import { ProfileValidationError } from '../profile/schema.js';
import { startAnalysisServer } from '../server/analysisSocket.js';
import {
  analyzeSeries,
  detectRingInImage,
  parseSeriesJson,
  resolveProfile,
} from '../runtime/services.js';
import { hashCanonicalJson } from '../serialization/canonicalJson.js';

const exitWithError = (message: string): never => {
  console.error(message);
  process.exit(1);
};

const printMainUsage = () => {
  console.log(`zeeman-cli – ring detection and Bohr magneton fitting for Fabry–Pérot photographs

Commands:
  profile validate <profile.json> [--json]
  detect --input <image> --x <px> --y <px> --r-low <px> --r-high <px> [--window <px>]
  fit <series.json> [--profile <path>] [--output <report.json>] [--json]
  serve [--port 8091] [--profile <path>]

Run "zeeman-cli <command> --help" to learn more about a command.`);
};

const printProfileUsage = () => {
  console.log(`zeeman-cli profile – instrument profile utilities

Usage:
  zeeman-cli profile validate <profile.json> [--json]
`);
};

const printDetectUsage = () => {
  console.log(`zeeman-cli detect

Enhance a photograph and refine one ring near an approximate center.

Required:
  --input <image>        Input image (any ffmpeg-supported format)
  --x <px>, --y <px>     Approximate ring center
  --r-low <px>           Lower bound of the radius band
  --r-high <px>          Upper bound of the radius band

Optional:
  --window <px>          Center search half-window (default 10)
  --profile <path>       Instrument profile with detector settings
  --ffmpeg <path>        ffmpeg executable (default "ffmpeg")
  --ffprobe <path>       ffprobe executable (default "ffprobe")
  --json                 Emit the detection summary as JSON
  --verbose              Log every scored hypothesis
`);
};

const printFitUsage = () => {
  console.log(`zeeman-cli fit

Reduce a measurement series and estimate the Bohr magneton and e/m.

Usage:
  zeeman-cli fit <series.json> [--profile <path>] [--output <report.json>] [--json]

The series file is a JSON array of {B, wavelength, radiusCenter?, radiusInner?, radiusOuter?}.
`);
};

const printServeUsage = () => {
  console.log(`zeeman-cli serve

Starts a WebSocket endpoint answering reduce, calibrate, fit and detect requests.

Flags:
  --port <number>     Port to listen on (default 8091)
  --profile <path>    Instrument profile used for every request
`);
};

const parseNumberFlag = (flag: string, value: string | undefined): number => {
  if (value === undefined) {
    return exitWithError(`${flag} requires a value.`);
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    return exitWithError(`${flag} expects a number, received "${value}".`);
  }
  return parsed;
};

const handleProfileCommand = async (args: string[]) => {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    printProfileUsage();
    process.exit(0);
  }

  const [subcommand, ...rest] = args;
  if (subcommand !== 'validate') {
    exitWithError(`Unknown profile subcommand "${subcommand}".`);
  }
  const flags = new Set(rest.filter((arg) => arg.startsWith('--')));
  const profilePath = rest.find((arg) => !arg.startsWith('--'));
  if (!profilePath) {
    return exitWithError('profile validate requires a profile path.');
  }
  const result = await loadProfileFromPath(profilePath);
  if (result.kind === 'success') {
    if (flags.has('--json')) {
      console.log(
        JSON.stringify(
          {
            status: 'ok',
            name: result.profile.name,
            schemaVersion: result.profile.schemaVersion,
            digest: hashCanonicalJson(result.profile).hash,
            warnings: result.issues,
          },
          null,
          2,
        ),
      );
      return;
    }
    console.log(`✔ Profile valid: ${profilePath}`);
    console.log(`  name:    ${result.profile.name}`);
    console.log(`  schema:  ${result.profile.schemaVersion}`);
    console.log(
      `  optics:  f=${result.profile.instrument.focalLength} n=${result.profile.instrument.refractiveIndex}`,
    );
    if (result.issues.length > 0) {
      console.warn('Warnings:');
      for (const issue of result.issues) {
        console.warn(`  • ${issue.message} (${issue.code})`);
      }
    }
    return;
  }

  if (flags.has('--json')) {
    console.log(
      JSON.stringify(
        { status: 'error', message: result.message, issues: result.issues ?? [] },
        null,
        2,
      ),
    );
  } else {
    console.error(`✖ Profile invalid: ${profilePath}`);
    console.error(`  ${result.message}`);
    for (const issue of result.issues ?? []) {
      console.error(`   • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
    }
  }
  process.exit(1);
};

const handleDetectCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printDetectUsage();
    process.exit(0);
  }

  let input: string | undefined;
  let x0: number | undefined;
  let y0: number | undefined;
  let rLow: number | undefined;
  let rHigh: number | undefined;
  let halfWindow = 10;
  let profilePath: string | undefined;
  let ffmpeg = 'ffmpeg';
  let ffprobe = 'ffprobe';
  let json = false;
  let verbose = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case '--input':
        input = args[++i];
        break;
      case '--x':
        x0 = parseNumberFlag(arg, args[++i]);
        break;
      case '--y':
        y0 = parseNumberFlag(arg, args[++i]);
        break;
      case '--r-low':
        rLow = parseNumberFlag(arg, args[++i]);
        break;
      case '--r-high':
        rHigh = parseNumberFlag(arg, args[++i]);
        break;
      case '--window':
        halfWindow = parseNumberFlag(arg, args[++i]);
        break;
      case '--profile':
        profilePath = args[++i];
        break;
      case '--ffmpeg':
        ffmpeg = args[++i] ?? ffmpeg;
        break;
      case '--ffprobe':
        ffprobe = args[++i] ?? ffprobe;
        break;
      case '--json':
        json = true;
        break;
      case '--verbose':
        verbose = true;
        break;
      default:
        exitWithError(`Unknown flag "${arg}"`);
    }
  }

  if (!input || x0 === undefined || y0 === undefined || rLow === undefined || rHigh === undefined) {
    return exitWithError('detect requires --input, --x, --y, --r-low and --r-high.');
  }

  const { profile } = await resolveProfile(profilePath);
  const summary = await detectRingInImage({
    input,
    x0,
    y0,
    rLow,
    rHigh,
    halfWindow,
    profile,
    ffmpeg,
    ffprobe,
    onHypothesis: verbose
      ? ({ candidate, hypothesis, replaced }) => {
          console.log(
            `[detect] (${candidate.x}, ${candidate.y}) → x=${hypothesis.x.toFixed(1)} y=${hypothesis.y.toFixed(1)} r=${hypothesis.r.toFixed(2)} score=${hypothesis.score.toFixed(4)}${replaced ? ' (replaced)' : ''}`,
          );
        }
      : undefined,
  });

  if (json) {
    console.log(JSON.stringify({ status: summary.ring ? 'ok' : 'not-found', ...summary }, null, 2));
    return;
  }
  console.log(`[detect] ${summary.input} (${summary.width}x${summary.height})`);
  console.log(
    `[detect] ${summary.candidates} candidate centers, ${summary.hypotheses} hypotheses in ${summary.durationMs.toFixed(1)}ms`,
  );
  if (!summary.ring) {
    console.log('[detect] no ring found in the search band');
    process.exitCode = 2;
    return;
  }
  const { ring } = summary;
  console.log(
    `[detect] ring at (${ring.x.toFixed(2)}, ${ring.y.toFixed(2)}) r=${ring.r.toFixed(2)} score=${ring.score.toFixed(4)}`,
  );
  if (summary.physicalRadius !== null) {
    console.log(`[detect] physical radius ${summary.physicalRadius.toPrecision(6)}`);
  }
};

const handleFitCommand = async (args: string[]) => {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printFitUsage();
    process.exit(0);
  }

  let seriesPath: string | undefined;
  let profilePath: string | undefined;
  let outputPath: string | undefined;
  let json = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    switch (arg) {
      case '--profile':
        profilePath = args[++i];
        break;
      case '--output':
        outputPath = args[++i];
        break;
      case '--json':
        json = true;
        break;
      default:
        if (arg.startsWith('--')) {
          exitWithError(`Unknown flag "${arg}"`);
        }
        seriesPath = arg;
    }
  }

  if (!seriesPath) {
    return exitWithError('fit requires a series path.');
  }

  const { profile } = await resolveProfile(profilePath);
  const records = parseSeriesJson(await readFile(resolve(process.cwd(), seriesPath), 'utf8'));
  const report = analyzeSeries(records, profile);

  if (outputPath) {
    const resolved = resolve(process.cwd(), outputPath);
    await writeFile(resolved, `${JSON.stringify(report, null, 2)}\n`, 'utf8');
    if (!json) {
      console.log(`[fit] report written to ${resolved}`);
    }
  }

  if (json) {
    console.log(JSON.stringify({ status: 'ok', ...report }, null, 2));
    return;
  }
  const { result } = report;
  console.log(
    `[fit] ${report.usable} usable record(s), ${report.skipped} skipped (profile "${report.profile}")`,
  );
  console.log(`[fit] μB inner   ${result.magnetonInner.toExponential(4)} J/T`);
  console.log(`[fit] μB outer   ${result.magnetonOuter.toExponential(4)} J/T`);
  console.log(`[fit] μB average ${result.magnetonAverage.toExponential(4)} J/T`);
  console.log(`[fit] e/m average ${result.chargeAverage.toExponential(4)} C/kg`);
  console.log(`[fit] digest ${report.digest}`);
};

const handleServeCommand = async (args: string[]) => {
  if (args.includes('--help') || args.includes('-h')) {
    printServeUsage();
    process.exit(0);
  }

  let port = 8091;
  let profilePath: string | undefined;
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === '--port') {
      port = parseNumberFlag(arg, args[++i]);
      continue;
    }
    if (arg === '--profile') {
      profilePath = args[++i];
      continue;
    }
    console.warn(`Unknown flag ${arg}`);
  }

  const { profile, issues } = await resolveProfile(profilePath);
  for (const issue of issues) {
    console.warn(`[analysis] profile warning: ${issue.message} (${issue.code})`);
  }
  const server = startAnalysisServer({ port, profile });

  server.on('error', (error) => {
    console.error('[analysis] server error', error);
    process.exit(1);
  });

  const shutdown = () => {
    console.log('\nShutting down analysis server…');
    server.close();
    process.exit(0);
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
};

const main = async () => {
  const [, , ...argv] = process.argv;
  if (argv.length === 0 || argv[0] === '--help' || argv[0] === '-h') {
    printMainUsage();
    process.exit(0);
  }
  const [command, ...rest] = argv;
  switch (command) {
    case 'profile':
      await handleProfileCommand(rest);
      break;
    case 'detect':
      await handleDetectCommand(rest);
      break;
    case 'fit':
      await handleFitCommand(rest);
      break;
    case 'serve':
      await handleServeCommand(rest);
      break;
    default:
      exitWithError(`Unknown command "${command}".`);
  }
};

main().catch((error: unknown) => {
  if (process.argv.includes('--json')) {
    console.log(
      JSON.stringify(
        {
          status: 'error',
          message: error instanceof Error ? error.message : String(error),
          ...(isRingLabError(error) && { code: error.code }),
          ...(error instanceof ProfileValidationError && { issues: error.issues }),
        },
        null,
        2,
      ),
    );
  } else if (error instanceof ProfileValidationError) {
    console.error(`✖ ${error.message}`);
    for (const issue of error.issues) {
      console.error(`   • ${issue.message} (${issue.code} @ ${issue.path.join('.')})`);
    }
  } else if (isRingLabError(error)) {
    console.error(`✖ ${error.message} (${error.code})`);
  } else {
    console.error(error instanceof Error ? error.message : error);
  }
  process.exit(1);
});
