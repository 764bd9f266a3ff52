export type Difficulty = 'easy' | 'medium' | 'hard';
export type OptionLabel = 'A' | 'B' | 'C' | 'D';
export type ValidationStatus = 'valid' | 'invalid' | 'needs_revision';

export type ContextFragment = {
  text: string;
  source: string;
  fragment_id: string;
  score?: number;
};

export type RetrievedFragment = ContextFragment & { score: number };

export type MCQOption = {
  // Stored as received; the A-D label set is checked by the validator
  readonly label: string;
  readonly text: string;
  readonly is_correct: boolean;
};

export type MCQMetadata = {
  readonly generation_order?: number;
  readonly revised_from?: string;
  readonly revision?: number;
  readonly [key: string]: string | number | boolean | undefined;
};

export type MCQ = {
  readonly id: string;
  readonly question: string;
  readonly options: readonly MCQOption[];
  readonly correct_answer: string;
  readonly explanation: string;
  readonly difficulty: Difficulty;
  readonly fragment_id: string;
  readonly source_filename: string;
  readonly context_snippet: string;
  readonly metadata: MCQMetadata;
};

export type CritiqueScores = {
  clarity_score: number;
  correctness_score: number;
  grounding_score: number;
};

export type CritiqueResult = Readonly<CritiqueScores> & {
  readonly mcq_index: number;
  readonly mcq_id: string;
  readonly difficulty_assessment: Difficulty;
  readonly issues: readonly string[];
  readonly suggestions: readonly string[];
  readonly overall_score: number;
};

export type ValidationResult = {
  readonly mcq_index: number;
  readonly mcq_id: string;
  readonly status: ValidationStatus;
  readonly is_context_grounded: boolean;
  readonly is_properly_formatted: boolean;
  readonly has_required_metadata: boolean;
  readonly has_hallucination: boolean;
  readonly validation_errors: readonly string[];
};

export type GenerationResult = {
  readonly query: string;
  readonly mcqs: readonly MCQ[];
  readonly critiques: readonly CritiqueResult[];
  readonly validations: readonly ValidationResult[];
  readonly valid_mcqs: readonly MCQ[];
  readonly invalid_mcqs: readonly MCQ[];
};

export type PublishedValidation = ValidationResult & { is_valid: boolean };

export type PublishedResult = {
  query: string;
  total_mcqs: number;
  valid_count: number;
  invalid_count: number;
  mcqs: MCQ[];
  critiques: CritiqueResult[];
  validations: PublishedValidation[];
  valid_mcqs: MCQ[];
};

export type RunStage =
  | 'retrieved'
  | 'generated'
  | 'critiqued'
  | 'validated'
  | 'revised'
  | 'aggregated'
  | 'no_context'
  | 'generation_empty';

export type BatchFailure = {
  query: string;
  index: number;
  message: string;
};

export type BatchResult = {
  results: GenerationResult[];
  failures: BatchFailure[];
  total_generated: number;
  total_valid: number;
  success_rate: number;
};
