import { describeStatus, toPublishedResult } from '@/lib/mcq';
import type { GenerationResult, MCQ, ValidationResult } from '@/lib/types';

const RULE = '-'.repeat(70);

export type TextExportOptions = {
  /** Render every generated MCQ instead of only the accepted ones */
  includeInvalid?: boolean;
};

function renderMcq(mcq: MCQ, position: number, validation: ValidationResult | undefined): string[] {
  const lines = [RULE, `MCQ #${position}`, RULE, `Question: ${mcq.question}`, '', 'Options:'];
  for (const opt of mcq.options) {
    lines.push(`  [${opt.is_correct ? 'x' : ' '}] ${opt.label}. ${opt.text}`);
  }
  lines.push(
    '',
    `Correct Answer: ${mcq.correct_answer}`,
    `Explanation: ${mcq.explanation}`,
    '',
    'Metadata:',
    `  - Difficulty: ${mcq.difficulty}`,
    `  - Source: ${mcq.source_filename}`,
    `  - Fragment ID: ${mcq.fragment_id}`
  );
  if (validation) {
    lines.push(`  - Status: ${describeStatus(validation.status)}`);
    for (const error of validation.validation_errors) {
      lines.push(`    ! ${error}`);
    }
  }
  return lines;
}

export function formatResultAsText(result: GenerationResult, options: TextExportOptions = {}): string {
  const published = toPublishedResult(result);
  const validations = new Map(result.validations.map((v) => [v.mcq_id, v]));
  const shown = options.includeInvalid ? result.mcqs : result.valid_mcqs;

  const lines = [
    `Query: ${published.query}`,
    `Generated: ${published.total_mcqs}  Valid: ${published.valid_count}  Invalid: ${published.invalid_count}`
  ];
  if (shown.length === 0) {
    lines.push('', 'No MCQs to show.');
    return lines.join('\n');
  }
  shown.forEach((mcq, i) => {
    lines.push('', ...renderMcq(mcq, i + 1, validations.get(mcq.id)));
  });
  return lines.join('\n');
}
