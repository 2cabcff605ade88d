import { describe, it, expect } from 'vitest';
import { readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import { XPathEngine } from '../../packages/xpath/src/engine/engine.js';
import { xmlAdapter } from '../../packages/xpath/src/dom/adapter.js';
import { parseXml } from '../../packages/xpath/src/dom/xml.js';
import { qualifiedName } from '../../packages/xpath/src/dom/types.js';
import type { XmlNode } from '../../packages/xpath/src/dom/types.js';
import { isXPathError } from '../../packages/xpath/src/errors.js';
import { NodeSet } from '../../packages/xpath/src/runtime/node-set.js';
import type { XPathValue } from '../../packages/xpath/src/runtime/types.js';
import { silentLogger } from '../../packages/xpath/src/utils/logger.js';

interface FixtureCase {
  id: string;
  name: string;
  description?: string;
  xml?: string;
  expression: string;
  namespaces?: Record<string, string>;
  expected: {
    value?: string | number | boolean;
    /** Node labels in document order. */
    nodes?: string[];
    /** Error code, e.g. XPATH_SYNTAX. */
    error?: string;
    message_contains?: string;
  };
}

interface FixtureSuite {
  suite: string;
  description?: string;
  xml?: string;
  cases: FixtureCase[];
}

function label(node: XmlNode): string {
  switch (node.type) {
    case 'document':
      return '/';
    case 'element':
      return qualifiedName(node);
    case 'attribute':
      return `@${qualifiedName(node)}=${node.value}`;
    case 'processing-instruction':
      return `?${node.target}`;
    default:
      return `${node.type}:${node.value}`;
  }
}

function evaluateCase(suite: FixtureSuite, tc: FixtureCase): XPathValue<XmlNode> {
  const xml = tc.xml ?? suite.xml;
  if (xml === undefined) {
    throw new Error(`Case ${tc.id} has no document`);
  }
  const engine = new XPathEngine(xmlAdapter, { logger: silentLogger });
  return engine.evaluate(tc.expression, parseXml(xml), { namespaces: tc.namespaces });
}

const fixturesDir = fileURLToPath(new URL('../fixtures', import.meta.url));
const fixtureFiles = readdirSync(fixturesDir).filter((f) => f.endsWith('.yaml'));

for (const file of fixtureFiles) {
  const content = readFileSync(join(fixturesDir, file), 'utf-8');
  const suite: FixtureSuite = parseYaml(content);

  describe(`[conformance] ${suite.suite}`, () => {
    for (const tc of suite.cases) {
      it(`${tc.id}: ${tc.name}`, () => {
        if (tc.expected.error !== undefined) {
          let caught: unknown;
          try {
            evaluateCase(suite, tc);
          } catch (err) {
            caught = err;
          }
          expect(isXPathError(caught)).toBe(true);
          if (isXPathError(caught)) {
            expect(caught.code).toBe(tc.expected.error);
            if (tc.expected.message_contains) {
              expect(caught.message).toContain(tc.expected.message_contains);
            }
          }
          return;
        }

        const result = evaluateCase(suite, tc);

        if (tc.expected.nodes !== undefined) {
          expect(result).toBeInstanceOf(NodeSet);
          if (result instanceof NodeSet) {
            expect(result.map(label)).toEqual(tc.expected.nodes);
          }
        }

        if (tc.expected.value !== undefined) {
          if (typeof tc.expected.value === 'number' && Number.isNaN(tc.expected.value)) {
            expect(result).toBeNaN();
          } else {
            expect(result).toBe(tc.expected.value);
          }
        }
      });
    }
  });
}
