/**
 * Minimal test harness shared by the check scripts.
 * Each script registers tests, then calls summarize() to print totals and set the exit code.
 */
import { isDeepStrictEqual } from 'node:util';

interface TestResult {
  name: string;
  passed: boolean;
  error?: string;
}

const results: TestResult[] = [];

export async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    results.push({ name, passed: true });
    console.log(`✓ ${name}`);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    results.push({ name, passed: false, error: message });
    console.log(`✗ ${name}: ${message}`);
  }
}

export function assertEq(actual: unknown, expected: unknown, label: string): void {
  if (actual !== expected) {
    throw new Error(`${label}: expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
  }
}

export function assertDeepEq(actual: unknown, expected: unknown, label: string): void {
  if (!isDeepStrictEqual(actual, expected)) {
    throw new Error(`${label}: expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
  }
}

export function assertThrows(fn: () => unknown, errorName: string, label: string): void {
  try {
    fn();
  } catch (error) {
    if (error instanceof Error && error.name === errorName) return;
    throw new Error(`${label}: expected ${errorName}, got ${String(error)}`);
  }
  throw new Error(`${label}: expected ${errorName}, nothing was thrown`);
}

export function summarize(): void {
  console.log('\n=== Summary ===');
  const passed = results.filter((r) => r.passed).length;
  const failed = results.filter((r) => !r.passed).length;
  console.log(`Passed: ${passed}, Failed: ${failed}`);

  process.exit(failed > 0 ? 1 : 0);
}
