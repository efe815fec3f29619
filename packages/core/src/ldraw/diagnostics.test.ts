import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  DiagnosticLog,
  createConsoleLogger,
  formatDebug,
  formatDiagnostic,
  silentLogger,
  summarizeDiagnostics,
  type Diagnostic,
  type ParserLogger,
} from './diagnostics.js';
import {
  DEFAULT_META_IGNORE,
  describeIssues,
  meshExportOptionsSchema,
  parseOptionsSchema,
  stlExportOptionsSchema,
} from './options.js';

const missing: Diagnostic = {
  code: 'SUBPART_NOT_FOUND',
  message: 'unable to find 3001.dat in /ldraw',
  file: 'model.ldr',
  line: 3,
  depth: 2,
};

describe('formatting', () => {
  it('indents warnings by depth and names the line', () => {
    expect(formatDiagnostic(missing)).toBe(
      '    WARN: [SUBPART_NOT_FOUND] unable to find 3001.dat in /ldraw (model.ldr:3)'
    );
  });

  it('leaves out a missing line number', () => {
    expect(formatDiagnostic({ ...missing, line: undefined, depth: 0 })).toBe(
      'WARN: [SUBPART_NOT_FOUND] unable to find 3001.dat in /ldraw (model.ldr)'
    );
  });

  it('indents debug lines the same way', () => {
    expect(formatDebug('parsing stud.dat invert[1]', 1)).toBe('  DEBUG: parsing stud.dat invert[1]');
  });
});

describe('DiagnosticLog', () => {
  it('records, counts and forwards each diagnostic', () => {
    const logger: ParserLogger = { debug: vi.fn(), warn: vi.fn() };
    const log = new DiagnosticLog(logger);

    log.report(missing);
    log.report({ ...missing, line: 4 });
    log.report({ ...missing, code: 'CYCLIC_REFERENCE' });

    expect(log.count('SUBPART_NOT_FOUND')).toBe(2);
    expect(log.count('CYCLIC_REFERENCE')).toBe(1);
    expect(log.count('UNKNOWN_LINE_TYPE')).toBe(0);
    expect(log.toArray().map((d) => d.line)).toEqual([3, 4, 3]);
    expect(logger.warn).toHaveBeenCalledTimes(3);
  });

  it('hands out copies of its entries', () => {
    const log = new DiagnosticLog(silentLogger);
    log.report(missing);
    log.toArray().pop();
    expect(log.toArray()).toHaveLength(1);
  });
});

describe('summarizeDiagnostics', () => {
  it('counts diagnostics per code', () => {
    expect(
      summarizeDiagnostics([missing, missing, { ...missing, code: 'DEGENERATE_TRIANGLE' }])
    ).toEqual({ SUBPART_NOT_FOUND: 2, DEGENERATE_TRIANGLE: 1 });
    expect(summarizeDiagnostics([])).toEqual({});
  });
});

describe('createConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes warnings to stderr and drops debug output by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const logger = createConsoleLogger();

    logger.debug('hidden', 0);
    logger.warn(missing);

    expect(error).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith(formatDiagnostic(missing));
  });

  it('writes debug output when enabled', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    createConsoleLogger({ debug: true }).debug('shown', 1);
    expect(error).toHaveBeenCalledWith('  DEBUG: shown');
  });
});

describe('option schemas', () => {
  it('fills in parser defaults', () => {
    expect(parseOptionsSchema.parse({})).toEqual({
      libraryPath: '/usr/share/ldraw',
      invert: false,
      debug: false,
      metaIgnore: [...DEFAULT_META_IGNORE],
      sourceName: '<input>',
    });
  });

  it('fills in export defaults', () => {
    expect(meshExportOptionsSchema.parse({})).toEqual({ scale: 1, mmPerLdu: 0.4 });
    expect(stlExportOptionsSchema.parse({ scale: 2 })).toEqual({ scale: 2, mmPerLdu: 0.4, name: 'model' });
  });

  it('describes issues by path', () => {
    const parsed = meshExportOptionsSchema.safeParse({ scale: -1 });
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(describeIssues(parsed.error)).toMatch(/^scale: /);
    }
  });
});
