/**
 * Shared page assets: the stylesheet is copied as-is, the filter script is
 * compiled from src/browser/filter.ts into a classic script.
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import ts from 'typescript';

// Resolved through src/ so the compiled copy under dist/ finds them too
const SOURCE_ROOT = resolve(__dirname, '../../src');
export const FILTER_SOURCE = resolve(SOURCE_ROOT, 'browser/filter.ts');
export const STYLESHEET = resolve(SOURCE_ROOT, 'site/assets/style.css');

export function loadStylesheet(): string {
  return readFileSync(STYLESHEET, 'utf-8');
}

export function buildFilterScript(): string {
  const source = readFileSync(FILTER_SOURCE, 'utf-8');
  const { outputText, diagnostics } = ts.transpileModule(source, {
    fileName: 'filter.ts',
    reportDiagnostics: true,
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2020,
      removeComments: true,
      newLine: ts.NewLineKind.LineFeed,
    },
  });

  const [firstError] = diagnostics ?? [];
  if (firstError) {
    const message = ts.flattenDiagnosticMessageText(firstError.messageText, '\n');
    throw new Error(`❌ Could not compile the filter script: ${message}`);
  }

  // The CommonJS output only needs an `exports` object to run in a browser
  return ['(function () {', 'var exports = {};', outputText.trim(), 'exports.bindFilter(document);', '})();', ''].join(
    '\n'
  );
}
