/**
 * Option label → option text, in presentation order.
 * Empty for free-text questions.
 */
export type OptionMap = Record<string, string>;

/**
 * One question to deliberate on. The gold label travels with the question for
 * scoring only; no stage places it in a prompt.
 */
export interface Question {
  readonly text: string;
  readonly options: Readonly<OptionMap>;
  readonly goldAnswer: string;
  readonly metaInfo?: string;
}

/**
 * One element of a pre-retrieved evidence cache, aligned with the dataset by index.
 * Only `evidence` is ever read for prompting; provenance fields such as
 * `instances.input` often carry the original QA item and must stay out of prompts.
 */
export interface EvidenceRecord {
  evidence?: unknown;
  instances?: unknown;
  [key: string]: unknown;
}

export type EvidenceFilterMode = 'off' | 'artifact_only';

export interface EvidenceFormatConfig {
  topk: number;          // <= 0 means "all snippets"
  maxChars: number;      // hard cap on formatted length
  minSnipChars: number;  // minimum normalized snippet length
  filterMode: EvidenceFilterMode;
}

/** Ordered, possibly repeating, list of specialty names. */
export type DomainSet = string[];

export interface DomainAnalysis {
  domain: string;
  analysis: string;
}

/** One entry per DomainSet entry, in DomainSet order (duplicates kept). */
export type AnalysisMap = DomainAnalysis[];

export type Opinion = 'yes' | 'no';

export type VoteRecord = Record<string, Opinion>;

export type RevisionAdvice = Record<string, string>;

export type ConsensusState = 'VOTING' | 'REVISING' | 'CONVERGED' | 'EXHAUSTED';

export type TerminalConsensusState = Extract<ConsensusState, 'CONVERGED' | 'EXHAUSTED'>;

export interface ConsensusOutcome {
  state: TerminalConsensusState;
  rounds: number;
  report: string;
  voteHistory: VoteRecord[];
  revisionHistory: RevisionAdvice[];
  reportHistory: string[];
}

export type DecisionStatus = 'parsed' | 'ambiguous';

export interface FinalDecision {
  answer: string;        // '' when ambiguous
  rationale: string;
  status: DecisionStatus;
  rawOutput: string;
}

/**
 * Stage identities, passed with every generation call and emitted as events.
 */
export type StageName =
  | 'S1_question_domain'
  | 'S1_options_domain'
  | 'S2_question_analysis'
  | 'S2_options_analysis'
  | 'S3_synth_report'
  | 'S4_vote'
  | 'S4_advice'
  | 'S4_revision'
  | 'S5_final';

/**
 * Terminal artifact of one pipeline run. Owned by the caller for persistence.
 */
export interface ResultRecord {
  readonly question: string;
  readonly options: Readonly<OptionMap>;
  readonly predAnswer: string;
  readonly goldAnswer: string;
  readonly metaInfo?: string;
  readonly questionDomains: readonly string[];
  readonly optionDomains: readonly string[];
  readonly questionAnalyses: readonly DomainAnalysis[];
  readonly optionAnalyses: readonly DomainAnalysis[];
  readonly synReport: string;
  readonly voteHistory: readonly VoteRecord[];
  readonly revisionHistory: readonly RevisionAdvice[];
  readonly reportHistory: readonly string[];
  readonly rawOutput: string;
  readonly decisionStatus: DecisionStatus;
  readonly consensusState: TerminalConsensusState;
  readonly consensusRounds: number;
}
