import { formatReport } from '../../../src/tools/format.js';
import type { ProcessSpec } from '../../../src/types/command.js';
import { okResult } from '../../helpers.js';

const spec: ProcessSpec = { executable: 'cargo', args: ['build', '--release'], cwd: '/work/proj', env: {} };
const header = '=== cargo build ===\nWorking directory: /work/proj\nCommand: cargo build --release\n\n';

describe('formatReport', () => {
  it('reports success with both streams', () => {
    const report = formatReport('cargo build', spec, okResult({ stdout: 'Compiling demo\n', stderr: 'warning: unused\n' }));
    expect(report).toBe(
      header + 'Command completed successfully\n\nSTDOUT:\nCompiling demo\n\nSTDERR:\nwarning: unused\n\n',
    );
  });

  it('reports a failing exit code with no output', () => {
    const report = formatReport('cargo build', spec, okResult({ exitCode: 101 }));
    expect(report).toBe(header + 'Command failed with exit code: 101\n\nNo output produced\n');
  });

  it('reports a timeout ahead of the signal', () => {
    const result = okResult({ exitCode: null, signal: 'SIGTERM', timedOut: true, durationMs: 3000 });
    expect(formatReport('cargo build', spec, result)).toBe(header + 'Command timed out after 3000 ms\n\nNo output produced\n');
  });

  it('reports termination by signal', () => {
    const result = okResult({ exitCode: null, signal: 'SIGKILL' });
    expect(formatReport('cargo build', spec, result)).toBe(header + 'Command terminated by signal SIGKILL\n\nNo output produced\n');
  });

  it('notes truncation and terminates a section without a trailing newline', () => {
    const result = okResult({ stdout: 'abc', truncated: true });
    expect(formatReport('cargo build', spec, result)).toBe(
      header + 'Command completed successfully\n\nOutput was truncated at the configured capture limit.\n\nSTDOUT:\nabc\n\n',
    );
  });
});
