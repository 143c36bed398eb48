#!/usr/bin/env node
/**
 * CLI for the course archiver
 *
 * The session is taken from the environment: COURSE_ARCHIVER_COOKIE holds the
 * Cookie header of a logged-in browser, COURSE_ARCHIVER_CSRF the CSRF token.
 */

import { Command, Option } from 'commander';
import { URL } from 'url';
import { CourseArchiver } from '../domain/archive/CourseArchiver';
import { AssetMaterializer } from '../domain/assets/AssetMaterializer';
import { OptimizationCache } from '../domain/cache/OptimizationCache';
import { MediaOptimizer } from '../domain/media/MediaOptimizer';
import { VideoExtractor } from '../domain/media/VideoExtractor';
import { RequiredResourceError } from '../domain/models/errors';
import { ArchiveOptions, ArchiverConfigFile, VideoFormat } from '../domain/models/types';
import { FreshnessProbe } from '../services/FreshnessProbe';
import { AxiosHttpClient } from '../services/HttpClient';
import { LocalObjectStore } from '../services/LocalObjectStore';
import { createLogger, LoggingService } from '../services/LoggingService';
import { PlatformSession } from '../services/PlatformSession';
import { ProcessRunner } from '../services/ProcessRunner';
import { TemplateRenderer } from '../services/TemplateRenderer';
import {
  DEFAULT_CONFIG_PATH,
  getEnvVar,
  getRequiredEnvVar,
  loadArchiverConfig,
  resolveInstanceProfile,
} from '../utils/ConfigLoader';

interface CliOptions {
  courseUrl: string;
  output: string;
  config: string;
  videoFormat: string;
  lowQuality: boolean;
  autoplay: boolean;
  cacheDir?: string;
  useAnyOptimizedVersion: boolean;
  ignoreUnsupported: boolean;
  logFile?: string;
  verbose: boolean;
}

/** External tools and the flag that makes them print their version */
const REQUIRED_BINARIES: Array<[string, string]> = [
  ['ffmpeg', '-version'],
  ['yt-dlp', '--version'],
  ['jpegoptim', '--version'],
  ['pngquant', '--version'],
  ['advdef', '--version'],
  ['gifsicle', '--version'],
];

const program = new Command();

program
  .name('course-archiver')
  .description('Archive an online course into a statically browsable directory')
  .requiredOption('--course-url <url>', 'URL of the course landing page')
  .option('--output <dir>', 'Output directory for the archive', 'output')
  .option('--config <file>', 'Path to archiver.json', DEFAULT_CONFIG_PATH)
  .addOption(
    new Option('--video-format <format>', 'Container of archived videos').choices(['mp4', 'webm']).default('mp4')
  )
  .option('--low-quality', 'Re-encode videos with the low-quality preset', false)
  .option('--autoplay', 'Start videos automatically', false)
  .option('--cache-dir <dir>', 'Optimization cache directory (default: $COURSE_ARCHIVER_CACHE_DIR)')
  .option('--use-any-optimized-version', 'Accept cached files from any optimizer version', false)
  .option('--ignore-unsupported', 'Replace unsupported units with a placeholder instead of failing', false)
  .option('--log-file <file>', 'Also write JSON logs to this file')
  .option('--verbose', 'Debug logging', false)
  .parse(process.argv);

function isVideoFormat(value: string): value is VideoFormat {
  return value === 'mp4' || value === 'webm';
}

async function warnMissingBinaries(tools: ProcessRunner, logger: LoggingService): Promise<void> {
  for (const [binary, versionFlag] of REQUIRED_BINARIES) {
    if (!(await tools.isAvailable(binary, versionFlag))) {
      logger.warn(`${binary} not found, related media will not be processed`);
    }
  }
}

function createArchiver(
  config: ArchiverConfigFile,
  options: ArchiveOptions,
  logger: LoggingService
): CourseArchiver {
  const courseUrl = new URL(options.courseUrl);
  const profile = resolveInstanceProfile(config, courseUrl.hostname);

  const sessionHeaders: Record<string, string> = {
    Cookie: getRequiredEnvVar('COURSE_ARCHIVER_COOKIE'),
    Referer: options.courseUrl,
  };
  const csrf = getEnvVar('COURSE_ARCHIVER_CSRF', '');
  if (csrf && profile.csrfHeader) {
    sessionHeaders[profile.csrfHeader] = csrf;
  }

  const http = new AxiosHttpClient(logger.child('http'), {
    session: { host: courseUrl.hostname, headers: sessionHeaders },
  });
  const tools = new ProcessRunner(logger.child('tools'));

  const store = options.cacheDir ? new LocalObjectStore(options.cacheDir, logger.child('cache')) : null;
  const cache = store
    ? new OptimizationCache(
        store,
        {
          optimizerVersions: config.optimizerVersions,
          useAnyOptimizedVersion: options.useAnyOptimizedVersion,
          lowQuality: options.lowQuality,
          videoFormats: config.videoFormats,
        },
        logger.child('cache')
      )
    : null;

  const materializer = new AssetMaterializer({
    http,
    probe: new FreshnessProbe(http, logger.child('probe')),
    optimizer: new MediaOptimizer(
      tools,
      {
        videoFormat: options.videoFormat,
        lowQuality: options.lowQuality,
        videoFormats: config.videoFormats,
        imageFormats: config.imageFormats,
      },
      logger.child('optimizer')
    ),
    videos: new VideoExtractor(tools, options.videoFormat, logger.child('videos')),
    cache,
    videoHostPatterns: config.videoHostPatterns,
    logger: logger.child('assets'),
  });

  return new CourseArchiver(config, options, {
    pages: new PlatformSession(http, courseUrl.origin, logger.child('session')),
    materializer,
    renderer: new TemplateRenderer(),
    logger,
    username: getEnvVar('COURSE_ARCHIVER_USERNAME', '') || undefined,
  });
}

async function main(): Promise<void> {
  const cli = program.opts<CliOptions>();
  const logger = createLogger('archiver', {
    logFile: cli.logFile,
    level: cli.verbose ? 'debug' : 'info',
  });

  if (!isVideoFormat(cli.videoFormat)) {
    throw new Error(`Unsupported video format: ${cli.videoFormat}`);
  }

  const options: ArchiveOptions = {
    courseUrl: cli.courseUrl,
    outputDir: cli.output,
    videoFormat: cli.videoFormat,
    lowQuality: cli.lowQuality,
    autoplay: cli.autoplay,
    ignoreUnsupported: cli.ignoreUnsupported,
    useAnyOptimizedVersion: cli.useAnyOptimizedVersion,
    cacheDir: cli.cacheDir ?? (getEnvVar('COURSE_ARCHIVER_CACHE_DIR', '') || undefined),
  };

  const config = loadArchiverConfig(cli.config);
  await warnMissingBinaries(new ProcessRunner(logger.child('tools')), logger);

  const archiver = createArchiver(config, options, logger);
  try {
    const summary = await archiver.run();
    console.log(`
Archive of "${summary.courseName}" written to ${options.outputDir}
  - Entry page: ${summary.entryPage}
  - Units: ${summary.downloadedUnits}/${summary.unitCount}
  - Failed units: ${summary.failedUnits.length}
  - Unresolved references: ${summary.unresolvedReferences.length}
`);
  } finally {
    await logger.close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof RequiredResourceError) {
    console.error(`Required resource unavailable: ${error.message}`);
  } else {
    console.error('Archiver error:', error);
  }
  process.exit(1);
});
