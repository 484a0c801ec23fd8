import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DependencyAnalyzer } from '../src/analysis/DependencyAnalyzer.js';
import { loadSampleGraphs, StaticGraphSource } from '../src/graph/GraphSource.js';
import { CircularDependencyError } from '../src/core/errors.js';
import { silentLogger } from '../src/core/logger.js';
import type { Logger } from '../src/core/logger.js';
import type { AnalysisRequest } from '../src/config/types.js';
import { CYCLIC } from './fixtures/graphs.js';

function request(overrides: Partial<AnalysisRequest> = {}): AnalysisRequest {
  return {
    packageName: 'A',
    useTestMode: false,
    reverseMode: false,
    asciiTreeEnabled: false,
    graphExportEnabled: false,
    outputDir: '.',
    ...overrides
  };
}

describe('loadSampleGraphs', () => {
  it('should load the shipped sample and cyclic graphs', () => {
    const { sample, cyclic } = loadSampleGraphs();

    expect([...sample.packages()]).toEqual(['A', 'B', 'C', 'D', 'E', 'F', 'G', 'H', 'I']);
    expect(sample.edgesOf('E')).toEqual(['H', 'I']);
    expect(cyclic.edgesOf('Z')).toEqual(['X']);
  });

  it('should reject a malformed data file', () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'depgraph-data-'));
    const file = path.join(tmpDir, 'graphs.json');
    fs.writeFileSync(file, JSON.stringify({ sample: { A: 'B' }, cyclic: {} }));

    try {
      expect(() => loadSampleGraphs(file)).toThrow();
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});

describe('DependencyAnalyzer', () => {
  let analyzer: DependencyAnalyzer;

  beforeEach(() => {
    analyzer = new DependencyAnalyzer({ logger: silentLogger });
  });

  describe('forward analysis', () => {
    it('should resolve the closure and the transitive set', () => {
      const report = analyzer.analyze(request());

      expect(report.direction).toBe('forward');
      expect(report.sourceName).toBe('repository (static sample)');
      expect(report.closure.get('A')).toEqual(['B', 'C']);
      expect(report.transitive).toEqual(['B', 'C', 'D', 'E', 'F', 'G', 'H', 'I']);
      expect(report.directReverse).toBeUndefined();
      expect(report.tree).toBeUndefined();
      expect(report.graphDescription).toBeUndefined();
      expect(report.cycleCheck).toBeUndefined();
    });

    it('should render the tree when enabled', () => {
      const report = analyzer.analyze(request({ packageName: 'C', asciiTreeEnabled: true }));

      expect(report.tree).toBe('C\n├── F\n└── G\n    └── I');
    });

    it('should use the same graph in test mode', () => {
      const normal = analyzer.analyze(request());
      const test = analyzer.analyze(request({ useTestMode: true }));

      expect(test.sourceName).toBe('test repository (static sample)');
      expect([...test.closure.entries()]).toEqual([...normal.closure.entries()]);
    });

    it('should propagate a cycle in the requested package', () => {
      const cyclicAnalyzer = new DependencyAnalyzer({
        logger: silentLogger,
        sources: { sample: CYCLIC, cyclic: CYCLIC }
      });

      expect(() => cyclicAnalyzer.analyze(request({ packageName: 'Y' })))
        .toThrow(new CircularDependencyError('Y', ['Y', 'Z', 'X']));
    });

    it('should warn about a package missing from the source', () => {
      const logger: Logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
      const report = new DependencyAnalyzer({ logger }).analyze(request({ packageName: 'Q', asciiTreeEnabled: true }));

      expect(logger.warn).toHaveBeenCalledWith(
        'Package Q not found in repository (static sample); treating it as a leaf'
      );
      expect(report.transitive).toEqual([]);
      expect(report.tree).toBe('Q');
    });
  });

  describe('reverse analysis', () => {
    it('should report dependents of the package', () => {
      const report = analyzer.analyze(request({ packageName: 'H', reverseMode: true }));

      expect(report.direction).toBe('reverse');
      expect(report.directReverse).toEqual(['D', 'E']);
      expect(report.transitive).toEqual(['D', 'E', 'B', 'A']);
      expect(report.closure.get('H')).toEqual(['D', 'E']);
    });

    it('should report no dependents for the top-level package', () => {
      const report = analyzer.analyze(request({ reverseMode: true, asciiTreeEnabled: true }));

      expect(report.directReverse).toEqual([]);
      expect(report.transitive).toEqual([]);
      expect(report.tree).toBe('A');
    });
  });

  describe('graph export', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'depgraph-analyze-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should write <package>_<direction>.dot into the output directory', () => {
      const report = analyzer.analyze(request({ packageName: 'D', graphExportEnabled: true, outputDir: tmpDir }));

      expect(report.exportPath).toBe(path.join(tmpDir, 'D_forward.dot'));
      expect(fs.readFileSync(path.join(tmpDir, 'D_forward.dot'), 'utf-8')).toBe(report.graphDescription);
      expect(report.graphDescription).toContain('  "D" -> "H";\n');
    });

    it('should write a scoped package export inside the output directory', () => {
      const sources = {
        sample: StaticGraphSource.fromRecord('sample', { '@scope/pkg': ['dep'] }),
        cyclic: CYCLIC
      };
      const report = new DependencyAnalyzer({ sources, logger: silentLogger }).analyze(request({
        packageName: '@scope/pkg',
        graphExportEnabled: true,
        outputDir: tmpDir
      }));

      expect(report.exportPath).toBe(path.join(tmpDir, '@scope_pkg_forward.dot'));
      expect(fs.readFileSync(path.join(tmpDir, '@scope_pkg_forward.dot'), 'utf-8'))
        .toContain('  "@scope/pkg" -> "dep";\n');
    });

    it('should name reverse exports accordingly', () => {
      const report = analyzer.analyze(request({
        packageName: 'I',
        reverseMode: true,
        graphExportEnabled: true,
        outputDir: tmpDir
      }));

      expect(report.exportPath).toBe(path.join(tmpDir, 'I_reverse.dot'));
      expect(report.graphDescription).toContain('  rankdir=BT;\n');
      expect(report.graphDescription).toContain('  "E" -> "I";\n');
    });
  });

  describe('cycle detection check', () => {
    it('should run in test mode and report the cycle without failing', () => {
      const report = analyzer.analyze(request({ useTestMode: true }));

      expect(report.cycleCheck).toEqual({
        root: 'X',
        detected: true,
        message: 'Circular dependency: X -> Y -> Z -> X',
        path: ['X', 'Y', 'Z']
      });
    });

    it('should report no cycle for an acyclic root', () => {
      const sources = {
        sample: StaticGraphSource.fromRecord('sample', { A: [] }),
        cyclic: StaticGraphSource.fromRecord('cyclic', { X: ['Y'], Y: [] })
      };
      const result = new DependencyAnalyzer({ sources, logger: silentLogger }).demonstrateCycleDetection();

      expect(result).toEqual({ root: 'X', detected: false, message: 'No cycle reachable from X', path: [] });
    });
  });
});
