import { describe, it, expect } from 'vitest';
import { FileAnalyzer } from '../../../../../src/core/detection/file-analyzer.js';
import { detectObserver } from '../../../../../src/core/detection/detectors/index.js';
import { loadKnowledgeBase } from '../../../../../src/core/knowledge/index.js';

const analyzer = new FileAnalyzer(loadKnowledgeBase(), {
  detectors: { for_statement: [detectObserver] },
});

function analyze(lines: string[]) {
  return analyzer.analyzeSource('events.py', lines.join('\n') + '\n');
}

describe('detectObserver', () => {
  it('should flag loops notifying observers', () => {
    const findings = analyze([
      'class Subject:',
      '    def notify_all(self, event):',
      '        for observer in self._observers:',
      '            observer.update(event)',
    ]);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      patternName: 'observer',
      opportunityType: 'refactor_to_pattern',
      confidence: 'medium',
      lineNumber: 3,
      description: 'Manual observer notification loop detected',
      currentCodeSnippet: 'for observer in self._observers:',
      reasoning: 'Loop over _observers calls notification methods on each element',
      effortEstimate: 'low',
      impactEstimate: 'medium',
    });
    expect(findings[0].priorityScore).toBeCloseTo(0.68);
  });

  it('should accept plain collections and handler-style methods', () => {
    const findings = analyze(['for listener in listeners:', '    listener.on_change(value)']);

    expect(findings).toHaveLength(1);
  });

  it('should ignore loops over other collections', () => {
    expect(analyze(['for item in self.items:', '    item.update()'])).toEqual([]);
  });

  it('should ignore loops that do not notify', () => {
    expect(analyze(['for subscriber in subscribers:', '    subscriber.close()'])).toEqual([]);
  });
});
