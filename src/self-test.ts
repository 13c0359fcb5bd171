// src/self-test.ts

import { buildMoveToRequest, buildStopRequest } from './commands/index.js';
import { errorMessage } from './errors.js';
import type { SelfTestCase, SelfTestCaseResult, SelfTestReport } from './types/rotator-types.js';

export const SELF_TEST_CASES: readonly SelfTestCase[] = [
  { input: 0, expected: 'AP0000\r;' },
  { input: 35, expected: 'AP0035\r;' },
  { input: 180, expected: 'AP0180\r;' },
  { input: 359, expected: 'AP0359\r;' },
  { input: 'stop', expected: ';' },
];

function runCase(testCase: SelfTestCase): SelfTestCaseResult {
  let actual: string;
  try {
    actual = testCase.input === 'stop' ? buildStopRequest() : buildMoveToRequest(testCase.input);
  } catch (err: unknown) {
    actual = `<${errorMessage(err)}>`;
  }
  return { ...testCase, actual, passed: actual === testCase.expected };
}

/**
 * Checks the RT21 encoder against known wire strings.
 */
export function runSelfTest(cases: readonly SelfTestCase[] = SELF_TEST_CASES): SelfTestReport {
  const results = cases.map(runCase);
  return { passed: results.every(r => r.passed), results };
}
