import { Readable } from 'stream';

export interface SourceLocation {
  repository: string; // empty for the standard library
  revision: string; // empty when the caller's default applies
  relativePath: string; // forward slashes, never a leading "/"
}

export interface ModuleSnapshot {
  directory: string;
  repository: string;
  revision: string;
}

export interface SourceFile {
  location: SourceLocation;
  repository: string;
  revision: string;
  relativePath: string; // within the materialized root
  filePath: string;
  content: Readable;
}
