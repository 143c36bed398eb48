/**
 * Core type definitions for the Course Archiver
 */

/**
 * Logging levels
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Network location a document was served from. Relative references found
 * inside the document resolve against it.
 */
export interface NetworkLocation {
  /** Scheme and host, e.g. https://courses.example.org */
  origin: string;
  /** Directory on the server, without trailing slash ('' for the root) */
  serverPath: string;
}

/**
 * Instance-specific URL layout of a course platform
 */
export interface InstanceProfile {
  /** Prefix of every course URL, e.g. /courses/ */
  coursePrefix: string;
  /** Suffix of the course landing page, e.g. /course */
  coursePageName: string;
  /** Base path of the courses REST API */
  apiBase: string;
  /** Optional CSRF header name expected by the instance */
  csrfHeader?: string;
}

/**
 * Configuration file structure (config/archiver.json)
 */
export interface ArchiverConfigFile {
  instances: Record<string, InstanceProfile>;
  optimizerVersions: Record<string, string>;
  videoHostPatterns: string[];
  downloadableExtensions: string[];
  audioFormats: string[];
  videoFormats: string[];
  imageFormats: string[];
}

export type VideoFormat = 'mp4' | 'webm';

/**
 * Runtime options for one archive run
 */
export interface ArchiveOptions {
  courseUrl: string;
  outputDir: string;
  videoFormat: VideoFormat;
  lowQuality: boolean;
  autoplay: boolean;
  ignoreUnsupported: boolean;
  useAnyOptimizedVersion: boolean;
  cacheDir?: string;
}

/**
 * Block as returned by the course blocks API
 */
export interface RawCourseBlock {
  id: string;
  block_id: string;
  type: string;
  display_name: string;
  descendants?: string[];
  student_view_url: string;
  lms_web_url: string;
  student_view_data?: {
    encoded_videos?: Record<string, { url: string; file_size?: number }>;
    /** Language code to transcript URL */
    transcripts?: Record<string, string>;
  };
}

/**
 * Course blocks API payload
 */
export interface CourseBlocksResponse {
  root: string;
  blocks: Record<string, RawCourseBlock>;
}

/**
 * Course metadata API payload
 */
export interface CourseInfo {
  id: string;
  name: string;
  org: string;
  short_description?: string;
}
