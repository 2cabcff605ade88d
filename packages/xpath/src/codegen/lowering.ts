/**
 * Lowers a query AST to a code AST.
 *
 * The generated program calls `define` once with a `query(rt, input)`
 * function. Node-producing constructs are lowered in continuation style:
 * `lowerNodes` receives an `emit` callback that builds the statement to run
 * for each selected node, so a path never materializes intermediate
 * node-sets beyond the first step.
 *
 * @module codegen/lowering
 */

import { EvaluationError, FunctionError, NodeTypeError } from '../errors.js';
import { formatAst } from '../compiler/ast.js';
import type {
  AxisNode,
  BinaryNode,
  FunctionNode,
  NodeTest,
  NodeTypeNode,
  PredicateNode,
  QueryAst,
} from '../compiler/ast.js';
import { lookupFunction } from '../runtime/functions.js';
import type { NamespaceMap, NodeKind } from '../runtime/types.js';
import {
  array,
  assign,
  binary,
  call,
  declare,
  fn,
  forOf,
  identifier,
  ifThen,
  literal,
  method,
  negate,
  ret,
  sequence,
} from './ir.js';
import type { CodeNode } from './ir.js';

type Emit = (node: CodeNode) => CodeNode;

interface Scope {
  readonly node: CodeNode;
  /** Set inside predicates only. */
  readonly position: CodeNode | null;
  readonly size: CodeNode | null;
}

const RT = identifier('rt');

/** Kinds whose result is allocated and returned as a node-set. */
const NODE_SET_KINDS: ReadonlySet<QueryAst['kind']> = new Set<QueryAst['kind']>([
  'absolute_path',
  'relative_path',
  'path',
  'axis',
  'predicate',
]);

export function returnsNodeSet(ast: QueryAst): boolean {
  return NODE_SET_KINDS.has(ast.kind);
}

/**
 * Lower `ast` to a complete program. `namespaces` maps prefixes used in
 * name tests to namespace URIs.
 */
export function lowerQuery(ast: QueryAst, namespaces: NamespaceMap = {}): CodeNode {
  return new Lowering(ast, namespaces).program();
}

class Lowering {
  private counter = 0;
  private readonly expression: string;

  constructor(
    private readonly root: QueryAst,
    private readonly namespaces: NamespaceMap,
  ) {
    this.expression = formatAst(root);
  }

  program(): CodeNode {
    return sequence(
      literal('use strict'),
      call(identifier('define'), fn(['rt', 'input'], this.body(), 'query')),
    );
  }

  private body(): CodeNode {
    const scope: Scope = { node: identifier('input'), position: null, size: null };

    if (!returnsNodeSet(this.root)) {
      return ret(this.lowerValue(this.root, scope));
    }

    const matched = this.unique('matched');
    return sequence(
      declare(matched, method(RT, 'nodeSet')),
      this.lowerNodes(this.root, scope, (node) => method(identifier(matched), 'add', node)),
      ret(method(identifier(matched), 'build')),
    );
  }

  private unique(base: string): string {
    return `${base}${++this.counter}`;
  }

  // -- node-producing constructs ------------------------------------------

  private lowerNodes(ast: QueryAst, scope: Scope, emit: Emit): CodeNode {
    switch (ast.kind) {
      case 'absolute_path': {
        const root = this.unique('root');
        return sequence(
          declare(root, method(RT, 'root', scope.node)),
          this.lowerSteps(ast.steps, identifier(root), emit),
        );
      }
      case 'relative_path':
        return this.lowerSteps(ast.steps, scope.node, emit);
      case 'path': {
        const item = this.unique('node');
        return forOf(
          item,
          method(RT, 'nodes', this.lowerValue(ast.filter, scope)),
          this.lowerSteps(ast.steps, identifier(item), emit),
        );
      }
      case 'axis':
        return this.lowerAxis(ast, scope.node, emit);
      case 'predicate':
        return this.filtered(array(scope.node), [ast], emit);
      case 'filter':
        return this.filtered(method(RT, 'nodes', this.lowerValue(ast.primary, scope)), ast.predicates, emit);
      case 'union':
        return sequence(this.lowerNodes(ast.left, scope, emit), this.lowerNodes(ast.right, scope, emit));
      case 'test':
      case 'wildcard':
      case 'node_type':
        throw this.cannotLower(ast);
      default: {
        // any other value must turn out to be a node-set at run time
        const item = this.unique('node');
        return forOf(item, method(RT, 'nodes', this.lowerValue(ast, scope)), emit(identifier(item)));
      }
    }
  }

  /**
   * Step one is collected into a temporary set; the remaining steps run
   * from each of its nodes.
   */
  private lowerSteps(steps: readonly AxisNode[], input: CodeNode, emit: Emit): CodeNode {
    if (steps.length === 0) return emit(input);
    const [first, ...rest] = steps;
    if (rest.length === 0) return this.lowerAxis(first, input, emit);

    const nodes = this.unique('nodes');
    const push = this.unique('push');
    const item = this.unique('node');
    return sequence(
      declare(
        nodes,
        method(RT, 'collect', fn([push], this.lowerAxis(first, input, (node) => call(identifier(push), node)))),
      ),
      forOf(item, identifier(nodes), this.lowerSteps(rest, identifier(item), emit)),
    );
  }

  private lowerAxis(step: AxisNode, input: CodeNode, emit: Emit): CodeNode {
    if (step.predicates.length === 0) return this.walkAxis(step, input, emit);

    // predicates count positions in axis order, so candidates keep it
    const push = this.unique('push');
    const candidates = method(
      RT,
      'sequence',
      fn([push], this.walkAxis(step, input, (node) => call(identifier(push), node))),
    );
    return this.filtered(candidates, step.predicates, emit);
  }

  private walkAxis(step: AxisNode, input: CodeNode, emit: Emit): CodeNode {
    const { test } = step;
    switch (step.axis) {
      case 'self':
        return this.guard(test, 'element', input, emit);
      case 'parent': {
        const parent = this.unique('parent');
        return sequence(
          declare(parent, method(RT, 'parent', input)),
          ifThen(binary('!==', identifier(parent), literal(null)), this.guard(test, 'element', identifier(parent), emit)),
        );
      }
      case 'child':
        return this.loop('children', test, 'element', input, emit);
      case 'attribute':
        return this.loop('attributes', test, 'attribute', input, emit);
      case 'descendant':
        return this.loop('descendants', test, 'element', input, emit);
      case 'descendant-or-self':
        return this.loop('descendantsOrSelf', test, 'element', input, emit);
      case 'ancestor':
        return this.loop('ancestors', test, 'element', input, emit);
      case 'ancestor-or-self':
        return this.loop('ancestorsOrSelf', test, 'element', input, emit);
      case 'following-sibling':
        return this.loop('followingSiblings', test, 'element', input, emit);
      case 'preceding-sibling':
        return this.loop('precedingSiblings', test, 'element', input, emit);
      case 'following':
        return this.loop('following', test, 'element', input, emit);
      case 'preceding':
        return this.loop('preceding', test, 'element', input, emit);
      case 'namespace':
        throw new NodeTypeError('The namespace axis is not supported', {
          expression: this.expression,
          nodeType: 'namespace',
          operation: formatAst(step),
        });
    }
  }

  private loop(axisMethod: string, test: NodeTest, principal: NodeKind, input: CodeNode, emit: Emit): CodeNode {
    const item = this.unique('node');
    return forOf(item, method(RT, axisMethod, input), this.guard(test, principal, identifier(item), emit));
  }

  private guard(test: NodeTest, principal: NodeKind, node: CodeNode, emit: Emit): CodeNode {
    const condition = this.nodeTest(test, principal, node);
    return condition === null ? emit(node) : ifThen(condition, emit(node));
  }

  private filtered(source: CodeNode, predicates: readonly PredicateNode[], emit: Emit): CodeNode {
    const candidates = this.unique('candidates');
    const item = this.unique('node');
    return sequence(
      declare(candidates, source),
      ...predicates.map((predicate) =>
        assign(candidates, method(RT, 'filter', identifier(candidates), this.predicate(predicate))),
      ),
      forOf(item, identifier(candidates), emit(identifier(item))),
    );
  }

  private predicate(predicate: PredicateNode): CodeNode {
    const node = this.unique('node');
    const position = this.unique('position');
    const size = this.unique('size');
    const scope: Scope = {
      node: identifier(node),
      position: identifier(position),
      size: identifier(size),
    };
    return fn([node, position, size], ret(this.lowerValue(predicate.expr, scope)));
  }

  // -- node tests ---------------------------------------------------------

  /** Condition for `test` on `node`, or null when every node passes. */
  private nodeTest(test: NodeTest, principal: NodeKind, node: CodeNode): CodeNode | null {
    switch (test.kind) {
      case 'node_type':
        return this.nodeTypeTest(test, node);
      case 'wildcard':
        return this.withPrefix(kindIs(node, principal), test.prefix, node);
      case 'test': {
        // local names match case-insensitively
        const nameMatches = binary(
          '===',
          method(method(RT, 'name', node), 'toLowerCase'),
          literal(test.name.toLowerCase()),
        );
        return this.withPrefix(binary('&&', kindIs(node, principal), nameMatches), test.prefix, node);
      }
    }
  }

  private nodeTypeTest(test: NodeTypeNode, node: CodeNode): CodeNode | null {
    switch (test.type) {
      case 'node':
        return null;
      case 'text':
        return binary('||', kindIs(node, 'text'), kindIs(node, 'cdata'));
      case 'comment':
        return kindIs(node, 'comment');
      case 'processing-instruction': {
        const isPi = kindIs(node, 'processing-instruction');
        if (test.target === null) return isPi;
        return binary('&&', isPi, binary('===', method(RT, 'name', node), literal(test.target)));
      }
    }
  }

  /**
   * A mapped prefix compares namespace URIs; an unmapped one falls back to
   * the prefix the node was written with.
   */
  private withPrefix(condition: CodeNode, prefix: string | null, node: CodeNode): CodeNode {
    if (prefix === null) return condition;
    const uri = Object.hasOwn(this.namespaces, prefix) ? this.namespaces[prefix] : undefined;
    const check =
      uri === undefined
        ? binary('===', method(RT, 'namespacePrefix', node), literal(prefix))
        : binary('===', method(RT, 'namespaceUri', node), literal(uri));
    return binary('&&', condition, check);
  }

  // -- values -------------------------------------------------------------

  private lowerValue(ast: QueryAst, scope: Scope): CodeNode {
    switch (ast.kind) {
      case 'absolute_path':
      case 'relative_path':
      case 'path':
      case 'axis':
      case 'predicate':
      case 'filter':
      case 'union': {
        const push = this.unique('push');
        return method(RT, 'select', fn([push], this.lowerNodes(ast, scope, (node) => call(identifier(push), node))));
      }
      case 'string':
        return literal(ast.value);
      case 'number':
        return literal(ast.value);
      case 'variable':
        return method(RT, 'variable', literal(ast.name));
      case 'function':
        return this.lowerFunction(ast, scope);
      case 'negate':
        return negate(this.asNumber(ast.operand, scope));
      case 'test':
      case 'wildcard':
      case 'node_type':
        throw this.cannotLower(ast);
      default:
        return this.lowerBinary(ast, scope);
    }
  }

  private lowerBinary(ast: BinaryNode, scope: Scope): CodeNode {
    switch (ast.kind) {
      case 'or':
        return binary('||', this.asBoolean(ast.left, scope), this.asBoolean(ast.right, scope));
      case 'and':
        return binary('&&', this.asBoolean(ast.left, scope), this.asBoolean(ast.right, scope));
      case 'eq':
      case 'neq':
      case 'lt':
      case 'gt':
      case 'lte':
      case 'gte':
        return method(
          RT,
          'compare',
          literal(ast.kind),
          this.lowerValue(ast.left, scope),
          this.lowerValue(ast.right, scope),
        );
      case 'plus':
        return binary('+', this.asNumber(ast.left, scope), this.asNumber(ast.right, scope));
      case 'minus':
        return binary('-', this.asNumber(ast.left, scope), this.asNumber(ast.right, scope));
      case 'star':
        return binary('*', this.asNumber(ast.left, scope), this.asNumber(ast.right, scope));
      case 'div':
        return binary('/', this.asNumber(ast.left, scope), this.asNumber(ast.right, scope));
      case 'mod':
        return binary('%', this.asNumber(ast.left, scope), this.asNumber(ast.right, scope));
    }
  }

  private lowerFunction(ast: FunctionNode, scope: Scope): CodeNode {
    const definition = lookupFunction(ast.name);
    if (!definition) {
      throw new FunctionError(`Unknown function: ${ast.name}()`, {
        expression: this.expression,
        functionName: ast.name,
        argumentCount: ast.args.length,
      });
    }
    definition.checkArity(ast.args.length, this.expression);

    if (ast.name === 'position' || ast.name === 'last') {
      const value = ast.name === 'position' ? scope.position : scope.size;
      if (value === null) {
        throw new FunctionError(`${ast.name}() can only be used in a predicate`, {
          expression: this.expression,
          functionName: ast.name,
          argumentCount: 0,
        });
      }
      return value;
    }

    const args = ast.args.map((arg) => this.lowerValue(arg, scope));
    return method(RT, 'call', literal(ast.name), scope.node, array(...args));
  }

  private asNumber(ast: QueryAst, scope: Scope): CodeNode {
    return method(RT, 'number', this.lowerValue(ast, scope));
  }

  private asBoolean(ast: QueryAst, scope: Scope): CodeNode {
    return method(RT, 'boolean', this.lowerValue(ast, scope));
  }

  private cannotLower(ast: QueryAst): EvaluationError {
    return new EvaluationError(`Cannot evaluate a bare ${ast.kind.replace('_', ' ')} outside a step`, {
      expression: this.expression,
      step: formatAst(ast),
    });
  }
}

function kindIs(node: CodeNode, kind: NodeKind): CodeNode {
  return binary('===', method(RT, 'kind', node), literal(kind));
}
