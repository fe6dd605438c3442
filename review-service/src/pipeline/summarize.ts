type SummaryInput = {
  codeLength: number;
  language: string;
  findingCount: number;
};

function summarize({ codeLength, language, findingCount }: SummaryInput): string {
  return `Analyzed ${codeLength} characters of ${language} code, found ${findingCount} potential issues`;
}

export const summarizeReview = { summarize };
