/**
 * xferctl Kernel — Output Formatter Tests
 *
 * OUT-U1: JSON mode writes pretty JSON and ignores text calls
 * OUT-U2: text mode writes printf/println output and ignores structured calls
 * OUT-U3: --format parsing
 */

import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../src/errors/errors.js';
import {
  JsonFormatter,
  OutputFormat,
  TextFormatter,
  createFormatter,
  parseOutputFormat,
} from '../src/output/formatter.js';
import type { TextSink } from '../src/output/formatter.js';

// ---------------------------------------------------------------------------
// Fixture
// ---------------------------------------------------------------------------

function buffer(): TextSink & { text: () => string } {
  const chunks: string[] = [];
  return {
    write(chunk: string) {
      chunks.push(chunk);
      return true;
    },
    text: () => chunks.join(''),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('OUT-U1: JSON mode', () => {
  it('pretty-prints with two-space indent and a trailing newline', () => {
    const sink = buffer();
    const out = createFormatter(OutputFormat.Json, sink);

    out.printStructured({ a: 1 });

    expect(out).toBeInstanceOf(JsonFormatter);
    expect(out.isStructured()).toBe(true);
    expect(sink.text()).toBe('{\n  "a": 1\n}\n');
  });

  it('ignores text output', () => {
    const sink = buffer();
    const out = createFormatter(OutputFormat.Json, sink);

    out.printText('Loaded %d record(s)\n', 3);
    out.println('hello');

    expect(sink.text()).toBe('');
  });
});

describe('OUT-U2: text mode', () => {
  it('formats printf directives without appending a newline', () => {
    const sink = buffer();
    const out = createFormatter(OutputFormat.Text, sink);

    out.printText('Loaded %d audit record(s) into %s', 5, '/tmp/audit.db');

    expect(out).toBeInstanceOf(TextFormatter);
    expect(out.isStructured()).toBe(false);
    expect(sink.text()).toBe('Loaded 5 audit record(s) into /tmp/audit.db');
  });

  it('joins println arguments with spaces', () => {
    const sink = buffer();
    const out = createFormatter(OutputFormat.Text, sink);

    out.println('Profile:', 'default');
    out.println();

    expect(sink.text()).toBe('Profile: default\n\n');
  });

  it('ignores structured output', () => {
    const sink = buffer();
    createFormatter(OutputFormat.Text, sink).printStructured({ a: 1 });
    expect(sink.text()).toBe('');
  });
});

describe('OUT-U3: parseOutputFormat', () => {
  it('accepts text and json', () => {
    expect(parseOutputFormat('text')).toBe(OutputFormat.Text);
    expect(parseOutputFormat('json')).toBe(OutputFormat.Json);
  });

  it('rejects anything else', () => {
    expect(() => parseOutputFormat('yaml')).toThrow(InvalidArgumentError);
    expect(() => parseOutputFormat('JSON')).toThrow('Unsupported output format "JSON" (expected text or json).');
  });
});
