import type { Finding } from '../types/types';

// Fixed stand-in results until a real analyzer is wired in.
export const MOCK_FINDINGS: readonly Readonly<Finding>[] = [
  {
    type: 'Long Method',
    severity: 'medium',
    line: 10,
    message: 'Method is too long, consider splitting it',
    suggestion: 'Split this method into several smaller methods that each do one thing',
  },
  {
    type: 'Magic Number',
    severity: 'low',
    line: 15,
    message: 'Magic number found',
    suggestion: 'Extract the hard-coded number into a named constant',
  },
  {
    type: 'Duplicate Code',
    severity: 'high',
    line: 25,
    message: 'Duplicate code found',
    suggestion: 'Extract the duplicated code into a shared function',
  },
];
