/**
 * Variables accepted by each page and fragment template
 */

import { VideoFormat } from '../domain/models/types';

export interface CourseTabLink {
  name: string;
  /** Path from the archive root */
  path: string;
}

/**
 * Course-wide data shared by every page layout
 */
export interface SiteContext {
  courseName: string;
  org: string;
  /** Entry page, relative to the archive root */
  entryPage: string;
  tabs: CourseTabLink[];
  /** Instance stylesheets, relative to the archive root */
  stylesheets: string[];
  /** Instance scripts loaded in the head, relative to the archive root */
  headScripts: string[];
  /** Instance scripts loaded at the end of the body */
  bodyScripts: string[];
}

export interface PageVariables {
  site: SiteContext;
  title: string;
  pathToRoot: string;
}

export interface SubtitleTrack {
  src: string;
  srclang: string;
  label: string;
}

export interface VideoVariables {
  format: VideoFormat;
  videoPath: string;
  title: string;
  autoplay: boolean;
  subtitles: SubtitleTrack[];
}

export interface AudioPlayerVariables {
  audioPath: string;
  format: string;
  title: string;
  pathToRoot: string;
}

export interface UnitFragmentVariables {
  token: string;
  type: string;
  content: string;
}

export interface UnavailableVariables {
  displayName: string;
  type: string;
  liveUrl: string;
}

export interface OutlineEntry {
  title: string;
  href?: string;
  children: OutlineEntry[];
}

export interface CoursePageVariables extends PageVariables {
  outline: OutlineEntry[];
}

export interface VerticalPageVariables extends PageVariables {
  breadcrumbs: string[];
  fragments: string[];
  previous?: string;
  next?: string;
}

export interface SpecificPageVariables extends PageVariables {
  content: string;
}

export interface BookEntry {
  url: string;
  name: string;
}

export interface BookNavVariables extends PageVariables {
  books: BookEntry[];
}

export interface HomeVariables extends PageVariables {
  messages: string[];
}

export interface RedirectVariables {
  title: string;
  target: string;
}

/**
 * Template name to variables
 */
export interface TemplateVariables {
  video: VideoVariables;
  audio_player: AudioPlayerVariables;
  unit_fragment: UnitFragmentVariables;
  unavailable: UnavailableVariables;
  course_page: CoursePageVariables;
  vertical_page: VerticalPageVariables;
  specific_page: SpecificPageVariables;
  booknav: BookNavVariables;
  home: HomeVariables;
  redirect: RedirectVariables;
}

export type TemplateName = keyof TemplateVariables;
