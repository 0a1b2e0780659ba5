// Pattern data structures
export type Intensity = 0 | 1 | 2 | 3;

/** One glyph: each row is a week, each character a day's intensity digit. */
export type Bitmap = readonly string[];

export interface Pattern {
  readonly figures: readonly Bitmap[];
  /** Blank weeks between consecutive figures. */
  readonly gapWeeks: number;
  /** Day zero of the repeating layout. */
  readonly epoch: Date;
}

// Configuration structures
export interface RepositoryConfig {
  readonly username: string;
  readonly repoName: string;
  readonly host: string;
  readonly sshUrl: string;
  readonly localPath: string;
  readonly remote: string;
  readonly branchCandidates: readonly string[];
}

export interface CommitConfig {
  readonly poolSize: number;
  readonly filePrefix: string;
  readonly label: string;
  readonly livePushEvery: number;
  readonly backdatedPushEvery: number;
  /** Inclusive hour range for backdated commit times. */
  readonly workHours: readonly [number, number];
  readonly essentialFiles: readonly string[];
  readonly essentialExtensions: readonly string[];
}

export interface LoggingConfig {
  readonly canvasLogFile: string;
  readonly doctorLogFile: string;
}

export interface AppConfig {
  readonly repository: RepositoryConfig;
  readonly pattern: Pattern;
  readonly commits: CommitConfig;
  readonly pacing: { readonly minMs: number; readonly maxMs: number };
  readonly logging: LoggingConfig;
}

// Diagnostic structures
export interface DiagnosticReport {
  exists: boolean;
  isRepository: boolean;
  remoteConfigured: boolean;
  branchesListed: boolean;
  hasCommits: boolean;
}
