export type ExtractionStrategy = 'class-keyword' | 'link-pattern' | 'structural';

export type RejectionReason = 'no-link' | 'short-title' | 'blacklisted-title' | 'error';

export interface JobRecord {
  readonly title: string;
  readonly link: string;
  readonly location: string;
  readonly department: string;
  readonly description: string;
}

export interface CandidateRejection {
  index: number;
  reason: RejectionReason;
  detail?: string;
}

export interface ExtractionReport {
  strategy: ExtractionStrategy | null;
  candidateCount: number;
  jobs: JobRecord[];
  rejections: CandidateRejection[];
}

export interface FeedChannel {
  title: string;
  link: string;
  description: string;
  language: string;
  feedUrl: string;
  baseUrl: string;
}

export interface FeedItem {
  title: string;
  link: string;
  description: string;
  guid: string;
  pubDate: string;
  source: {
    name: string;
    url: string;
  };
}

export type KnownLinkSet = ReadonlySet<string>;

export type PipelineState =
  | 'read-previous'
  | 'fetch'
  | 'extract'
  | 'deduplicate'
  | 'decide'
  | 'build-and-persist'
  | 'noop';

export interface PipelineOutcome {
  state: 'built' | 'noop';
  scrapedCount: number;
  freshCount: number;
  writtenCount: number;
  outputPath: string;
}
