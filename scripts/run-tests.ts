import { existsSync, readdirSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import { spawnSync } from 'node:child_process';

const projectRoot = process.cwd();
// `npm test -- webhooks` runs only files whose path contains "webhooks".
const filter = process.argv[2] ?? null;

// Tests live in __tests__ directories beside the modules they cover.
const findTestFiles = (dir: string, inTestDir: boolean): string[] => {
  if (!existsSync(dir)) {
    return [];
  }
  return readdirSync(dir, { withFileTypes: true })
    .sort((left, right) => left.name.localeCompare(right.name))
    .flatMap((entry) => {
      const fullPath = join(dir, entry.name);
      if (entry.isDirectory()) {
        return entry.name === 'node_modules' ? [] : findTestFiles(fullPath, entry.name === '__tests__');
      }
      return inTestDir && entry.isFile() && entry.name.endsWith('.test.ts')
        ? [relative(projectRoot, fullPath)]
        : [];
    });
};

const testFiles = findTestFiles(resolve(projectRoot, 'src'), false)
  .filter((file) => filter === null || file.includes(filter));

if (testFiles.length === 0) {
  console.error(filter ? `No test files match "${filter}"` : 'No test files found');
  process.exit(1);
}

const tsxBin = process.platform === 'win32'
  ? resolve(projectRoot, 'node_modules', '.bin', 'tsx.cmd')
  : resolve(projectRoot, 'node_modules', '.bin', 'tsx');

if (!existsSync(tsxBin)) {
  console.error(`Missing tsx binary at ${tsxBin}`);
  process.exit(1);
}

type FileOutcome = { file: string; ok: boolean; durationMs: number; detail: string | null };

const runFile = (file: string): FileOutcome => {
  const startedAt = Date.now();
  const result = spawnSync(tsxBin, [file], { cwd: projectRoot, stdio: 'inherit' });
  const durationMs = Date.now() - startedAt;
  if (result.error) {
    return { file, ok: false, durationMs, detail: result.error.message };
  }
  if (result.status === null) {
    return { file, ok: false, durationMs, detail: `killed by ${result.signal ?? 'unknown signal'}` };
  }
  return { file, ok: result.status === 0, durationMs, detail: result.status === 0 ? null : `exit ${result.status}` };
};

// Every file runs even after a failure, so one broken suite cannot hide another.
const outcomes: FileOutcome[] = [];
for (const file of testFiles) {
  console.log(`\nRUN ${file}`);
  outcomes.push(runFile(file));
}

console.log('\nSummary');
for (const outcome of outcomes) {
  const status = outcome.ok ? 'PASS' : 'FAIL';
  const detail = outcome.detail ? ` (${outcome.detail})` : '';
  console.log(`  ${status} ${outcome.file} ${outcome.durationMs}ms${detail}`);
}

const failedFiles = outcomes.filter((outcome) => !outcome.ok);
console.log(`\n${outcomes.length} test files: ${outcomes.length - failedFiles.length} passed, ${failedFiles.length} failed`);
if (failedFiles.length > 0) {
  process.exit(1);
}
