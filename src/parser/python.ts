import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { ScopeTable } from './scope.js';
import { resolvePythonImport, isPackageInit } from './resolver.js';
import type {
  DefinitionKind,
  Diagnostic,
  FileAnalysis,
  ImportDeclaration,
  ImportEdge,
  PythonAnalyzerOptions,
} from './types.js';

const pyParser = new Parser();
pyParser.setLanguage(Python);

const PARSE_BUFFER_SIZE = 1024 * 1024;

const COMPREHENSIONS = new Set([
  'list_comprehension',
  'set_comprehension',
  'dictionary_comprehension',
  'generator_expression',
]);

const TARGET_GROUPS = new Set([
  'pattern_list',
  'tuple_pattern',
  'list_pattern',
  'tuple',
  'list',
  'expression_list',
  'parenthesized_expression',
  'list_splat_pattern',
  'list_splat',
]);

interface Context {
  filePath: string;
  table: ScopeTable;
  attributeNames: Set<string>;
  imports: ImportDeclaration[];
  diagnostics: Diagnostic[];
  flagWildcardImports: boolean;
}

/**
 * Parse one Python file and build its scoped definitions, uses and resolved
 * import edges. Files that do not parse cleanly are reported as skipped and
 * contribute nothing else.
 */
export function analyzePythonSource(
  filePath: string,
  sourceCode: string,
  options: PythonAnalyzerOptions
): FileAnalysis {
  const tree = pyParser.parse(sourceCode, undefined, { bufferSize: PARSE_BUFFER_SIZE });
  const root = tree.rootNode;

  if (root.hasError) {
    const errorNode = findFirstError(root);
    const line = (errorNode ?? root).startPosition.row + 1;
    return skippedFile(filePath, `Syntax error near line ${line}`);
  }

  const context: Context = {
    filePath,
    table: new ScopeTable(),
    attributeNames: new Set(),
    imports: [],
    diagnostics: [],
    flagWildcardImports: options.flagWildcardImports,
  };

  visitChildren(root, context);

  const { definitions, uses } = context.table.finish();

  return {
    filePath,
    definitions,
    uses,
    attributeNames: Array.from(context.attributeNames).sort(),
    imports: context.imports,
    importEdges: resolveImportEdges(filePath, context.imports, options),
    diagnostics: context.diagnostics,
    skipped: false,
  };
}

export function skippedFile(filePath: string, reason: string): FileAnalysis {
  return {
    filePath,
    definitions: [],
    uses: [],
    attributeNames: [],
    imports: [],
    importEdges: [],
    diagnostics: [{ kind: 'file-skipped', filePath, message: reason }],
    skipped: true,
  };
}

function visit(node: Parser.SyntaxNode, context: Context): void {
  switch (node.type) {
    case 'identifier':
      context.table.reference(node.text, lineOf(node));
      return;
    case 'function_definition':
      processFunctionDefinition(node, context);
      return;
    case 'class_definition':
      processClassDefinition(node, context);
      return;
    case 'decorated_definition':
      processDecoratedDefinition(node, context);
      return;
    case 'lambda':
      processLambda(node, context);
      return;
    case 'assignment':
      processAssignment(node, context);
      return;
    case 'augmented_assignment':
      processAugmentedAssignment(node, context);
      return;
    case 'named_expression':
      processNamedExpression(node, context);
      return;
    case 'for_statement':
      processForStatement(node, context);
      return;
    case 'as_pattern':
      processAsPattern(node, context);
      return;
    case 'with_item':
      processWithItem(node, context);
      return;
    case 'except_clause':
      processExceptClause(node, context);
      return;
    case 'import_statement':
      processImportStatement(node, context);
      return;
    case 'import_from_statement':
      processImportFromStatement(node, context);
      return;
    case 'future_import_statement':
      return;
    case 'global_statement':
    case 'nonlocal_statement':
      processScopeDeclaration(node, context);
      return;
    case 'attribute':
      processAttribute(node, context);
      return;
    case 'keyword_argument':
      visitField(node, 'value', context);
      return;
    case 'case_clause':
      processCaseClause(node, context);
      return;
    case 'type_parameter':
      return;
  }

  if (COMPREHENSIONS.has(node.type)) {
    processComprehension(node, context);
    return;
  }

  visitChildren(node, context);
}

/** First ERROR or MISSING node in document order, descending only into subtrees that contain one. */
function findFirstError(root: Parser.SyntaxNode): Parser.SyntaxNode | null {
  const stack: Parser.SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === 'ERROR' || node.isMissing) {
      return node;
    }

    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child.hasError || child.isMissing) {
        stack.push(child);
      }
    }
  }

  return null;
}

function visitChildren(node: Parser.SyntaxNode, context: Context): void {
  for (const child of node.namedChildren) {
    visit(child, context);
  }
}

function visitField(node: Parser.SyntaxNode, field: string, context: Context): void {
  const child = node.childForFieldName(field);
  if (child) {
    visit(child, context);
  }
}

function processFunctionDefinition(node: Parser.SyntaxNode, context: Context): void {
  const nameNode = node.childForFieldName('name');
  const parameters = node.childForFieldName('parameters');

  if (nameNode) {
    context.table.bind(nameNode.text, lineOf(nameNode), 'function');
  }

  const typeParameters = enterTypeParameterScope(node, context);

  // Defaults and annotations are evaluated where the def statement runs
  if (parameters) {
    visitParameterExpressions(parameters, context);
  }
  visitField(node, 'return_type', context);

  context.table.enterScope('function');
  if (parameters) {
    bindParameters(parameters, context);
  }
  visitField(node, 'body', context);
  context.table.exitScope();

  if (typeParameters) {
    context.table.exitScope();
  }
}

function processClassDefinition(node: Parser.SyntaxNode, context: Context): void {
  const nameNode = node.childForFieldName('name');

  if (nameNode) {
    context.table.bind(nameNode.text, lineOf(nameNode), 'class');
  }

  const typeParameters = enterTypeParameterScope(node, context);

  // Base classes and keywords such as metaclass= belong to the enclosing scope
  visitField(node, 'superclasses', context);

  context.table.enterScope('class');
  visitField(node, 'body', context);
  context.table.exitScope();

  if (typeParameters) {
    context.table.exitScope();
  }
}

/**
 * `def f[T](...)` and `class C[T]` get a scope of their own holding the type
 * parameters, visible to annotations, bases and the body. Returns whether one
 * was entered.
 */
function enterTypeParameterScope(node: Parser.SyntaxNode, context: Context): boolean {
  const typeParameters = node.namedChildren.find(c => c.type === 'type_parameter');
  if (!typeParameters) return false;

  context.table.enterScope('function');

  const bounds: Parser.SyntaxNode[] = [];
  for (const param of typeParameters.namedChildren) {
    const name = typeParameterName(param, bounds);
    if (name) {
      context.table.bind(name.text, lineOf(name), 'parameter');
    }
  }

  // Bounds and constraints may refer to any of the parameters
  for (const bound of bounds) {
    visit(bound, context);
  }

  return true;
}

function typeParameterName(param: Parser.SyntaxNode, bounds: Parser.SyntaxNode[]): Parser.SyntaxNode | null {
  switch (param.type) {
    case 'identifier':
      return param;
    case 'type':
    case 'splat_type': {
      const [inner] = param.namedChildren;
      return inner ? typeParameterName(inner, bounds) : null;
    }
    case 'constrained_type': {
      const [name, ...rest] = param.namedChildren;
      bounds.push(...rest);
      return name ? typeParameterName(name, bounds) : null;
    }
    default:
      return null;
  }
}

function processDecoratedDefinition(node: Parser.SyntaxNode, context: Context): void {
  for (const child of node.namedChildren) {
    if (child.type === 'decorator') {
      visitChildren(child, context);
    }
  }

  visitField(node, 'definition', context);
}

function processLambda(node: Parser.SyntaxNode, context: Context): void {
  const parameters = node.childForFieldName('parameters');

  if (parameters) {
    visitParameterExpressions(parameters, context);
  }

  context.table.enterScope('lambda');
  if (parameters) {
    bindParameters(parameters, context);
  }
  visitField(node, 'body', context);
  context.table.exitScope();
}

function processComprehension(node: Parser.SyntaxNode, context: Context): void {
  context.table.enterScope('comprehension');

  for (const child of node.namedChildren) {
    if (child.type === 'for_in_clause') {
      const left = child.childForFieldName('left');
      for (const part of child.namedChildren) {
        if (left && sameNode(part, left)) continue;
        visit(part, context);
      }
      if (left) {
        bindTargets(left, context, 'variable');
      }
    } else if (child.type === 'if_clause') {
      visitChildren(child, context);
    }
  }

  // Yielded expression (or key: value pair) last, once the loop targets exist
  visitField(node, 'body', context);

  context.table.exitScope();
}

function processAssignment(node: Parser.SyntaxNode, context: Context): void {
  visitField(node, 'right', context);
  visitField(node, 'type', context);

  const left = node.childForFieldName('left');
  if (left) {
    bindTargets(left, context, 'variable');
  }
}

function processAugmentedAssignment(node: Parser.SyntaxNode, context: Context): void {
  visitField(node, 'right', context);

  const left = node.childForFieldName('left');
  if (!left) return;

  if (left.type === 'identifier') {
    // `x += 1` reads x before rebinding it
    context.table.reference(left.text, lineOf(left));
    context.table.bind(left.text, lineOf(left), 'variable');
  } else {
    visit(left, context);
  }
}

function processNamedExpression(node: Parser.SyntaxNode, context: Context): void {
  visitField(node, 'value', context);

  const name = node.childForFieldName('name');
  if (name) {
    context.table.bindOutsideComprehension(name.text, lineOf(name), 'variable');
  }
}

function processForStatement(node: Parser.SyntaxNode, context: Context): void {
  const left = node.childForFieldName('left');
  if (left) {
    bindTargets(left, context, 'variable');
  }

  visitField(node, 'right', context);
  visitField(node, 'body', context);
  visitField(node, 'alternative', context);
}

function processAsPattern(node: Parser.SyntaxNode, context: Context): void {
  // with open(p) as fh / except E as e
  const alias = node.childForFieldName('alias');

  for (const child of node.namedChildren) {
    if (alias && sameNode(child, alias)) continue;
    visit(child, context);
  }

  if (alias) {
    bindTargets(alias, context, 'variable');
  }
}

function processWithItem(node: Parser.SyntaxNode, context: Context): void {
  // Grammars without as_pattern give the item an alias field of its own
  visitField(node, 'value', context);

  const alias = node.childForFieldName('alias');
  if (alias) {
    bindTargets(alias, context, 'variable');
  }
}

function processExceptClause(node: Parser.SyntaxNode, context: Context): void {
  // Older grammars put `as` and the name directly in the clause, newer ones
  // use an as_pattern (handled by visit) or an alias field
  const alias = node.childForFieldName('alias');
  const asToken = node.children.find(c => c.type === 'as');

  for (const child of node.namedChildren) {
    if (alias && sameNode(child, alias)) {
      bindTargets(child, context, 'variable');
    } else if (asToken && child.type === 'identifier' && child.startIndex > asToken.startIndex) {
      context.table.bind(child.text, lineOf(child), 'variable');
    } else {
      visit(child, context);
    }
  }
}

function processAttribute(node: Parser.SyntaxNode, context: Context): void {
  visitField(node, 'object', context);

  const attribute = node.childForFieldName('attribute');
  if (attribute) {
    context.attributeNames.add(attribute.text);
  }
}

function processScopeDeclaration(node: Parser.SyntaxNode, context: Context): void {
  const isGlobal = node.type === 'global_statement';

  for (const child of node.namedChildren) {
    if (child.type !== 'identifier') continue;
    if (isGlobal) {
      context.table.declareGlobal(child.text);
    } else {
      context.table.declareNonlocal(child.text);
    }
  }
}

function processImportStatement(node: Parser.SyntaxNode, context: Context): void {
  // import os
  // import os.path
  // import numpy as np

  for (const child of node.namedChildren) {
    if (child.type === 'dotted_name') {
      const moduleName = child.text;
      // `import a.b.c` makes only `a` available
      context.table.bind(moduleName.split('.')[0], lineOf(child), 'import-alias');
      context.imports.push({ module: moduleName, level: 0, names: [], wildcard: false, line: lineOf(node) });
    } else if (child.type === 'aliased_import') {
      const nameNode = child.childForFieldName('name');
      const aliasNode = child.childForFieldName('alias');
      if (!nameNode) continue;

      const bound = aliasNode ?? nameNode;
      context.table.bind(aliasNode ? aliasNode.text : nameNode.text.split('.')[0], lineOf(bound), 'import-alias');
      context.imports.push({ module: nameNode.text, level: 0, names: [], wildcard: false, line: lineOf(node) });
    }
  }
}

function processImportFromStatement(node: Parser.SyntaxNode, context: Context): void {
  // from pathlib import Path
  // from .utils import helper as h
  // from .. import models
  // from config import *

  const moduleNode = node.childForFieldName('module_name');
  if (!moduleNode) return;

  let module = moduleNode.text;
  let level = 0;

  if (moduleNode.type === 'relative_import') {
    const prefix = moduleNode.namedChildren.find(c => c.type === 'import_prefix');
    const dotted = moduleNode.namedChildren.find(c => c.type === 'dotted_name');
    level = prefix ? countDots(prefix.text) : 0;
    module = dotted ? dotted.text : '';
  }

  const names: string[] = [];
  let wildcard = false;

  for (const child of node.namedChildren) {
    if (sameNode(child, moduleNode)) continue;

    if (child.type === 'wildcard_import') {
      wildcard = true;
    } else if (child.type === 'dotted_name') {
      names.push(child.text);
      context.table.bind(child.text, lineOf(child), 'import-alias');
    } else if (child.type === 'aliased_import') {
      const nameNode = child.childForFieldName('name');
      const aliasNode = child.childForFieldName('alias');
      if (!nameNode) continue;

      names.push(nameNode.text);
      const bound = aliasNode ?? nameNode;
      context.table.bind(bound.text, lineOf(bound), 'import-alias');
    }
  }

  const line = lineOf(node);
  context.imports.push({ module, level, names, wildcard, line });

  if (wildcard && context.flagWildcardImports) {
    const source = '.'.repeat(level) + module;
    context.diagnostics.push({
      kind: 'wildcard-import',
      filePath: context.filePath,
      line,
      message: `Wildcard import from ${source} hides which names it defines`,
    });
  }
}

function processCaseClause(node: Parser.SyntaxNode, context: Context): void {
  for (const child of node.namedChildren) {
    if (child.type === 'case_pattern') {
      bindPattern(child, context);
    } else {
      visit(child, context);
    }
  }
}

/**
 * Walk a match-statement pattern: bare names capture (bind), dotted names and
 * class patterns read their leading name.
 */
function bindPattern(node: Parser.SyntaxNode, context: Context): void {
  switch (node.type) {
    case 'identifier':
      if (node.text !== '_') {
        context.table.bind(node.text, lineOf(node), 'variable');
      }
      return;
    case 'dotted_name': {
      const parts = node.namedChildren.filter(c => c.type === 'identifier');
      if (parts.length === 1) {
        bindPattern(parts[0], context);
      } else if (parts.length > 1) {
        context.table.reference(parts[0].text, lineOf(parts[0]));
      }
      return;
    }
    case 'class_pattern': {
      const [className, ...rest] = node.namedChildren;
      if (className && className.type === 'dotted_name') {
        const head = className.namedChildren[0];
        if (head) context.table.reference(head.text, lineOf(head));
      }
      for (const child of rest) bindPattern(child, context);
      return;
    }
    case 'keyword_pattern':
      // Keyword names are attribute names of the matched object
      for (const child of node.namedChildren.slice(1)) bindPattern(child, context);
      return;
    case 'string':
    case 'concatenated_string':
      visit(node, context);
      return;
  }

  for (const child of node.namedChildren) {
    bindPattern(child, context);
  }
}

/** Bind every name a store target introduces; attribute and subscript targets are reads. */
function bindTargets(node: Parser.SyntaxNode, context: Context, kind: DefinitionKind): void {
  if (node.type === 'identifier') {
    context.table.bind(node.text, lineOf(node), kind);
    return;
  }

  if (node.type === 'as_pattern_target') {
    if (node.namedChildCount === 0) {
      context.table.bind(node.text, lineOf(node), kind);
    } else {
      for (const child of node.namedChildren) bindTargets(child, context, kind);
    }
    return;
  }

  if (TARGET_GROUPS.has(node.type)) {
    for (const child of node.namedChildren) {
      bindTargets(child, context, kind);
    }
    return;
  }

  visit(node, context);
}

/** Default values and annotations in a parameter list, visited in the enclosing scope. */
function visitParameterExpressions(parameters: Parser.SyntaxNode, context: Context): void {
  for (const param of parameters.namedChildren) {
    switch (param.type) {
      case 'default_parameter':
        visitField(param, 'value', context);
        break;
      case 'typed_parameter':
        visitField(param, 'type', context);
        break;
      case 'typed_default_parameter':
        visitField(param, 'type', context);
        visitField(param, 'value', context);
        break;
    }
  }
}

function bindParameters(parameters: Parser.SyntaxNode, context: Context): void {
  for (const param of parameters.namedChildren) {
    for (const nameNode of parameterNames(param)) {
      context.table.bind(nameNode.text, lineOf(nameNode), 'parameter');
    }
  }
}

function parameterNames(param: Parser.SyntaxNode): Parser.SyntaxNode[] {
  switch (param.type) {
    case 'identifier':
      return [param];
    case 'default_parameter':
    case 'typed_default_parameter': {
      const name = param.childForFieldName('name');
      return name ? parameterNames(name) : [];
    }
    case 'typed_parameter': {
      const type = param.childForFieldName('type');
      const name = param.namedChildren.find(c => !type || !sameNode(c, type));
      return name ? parameterNames(name) : [];
    }
    case 'list_splat_pattern':
    case 'dictionary_splat_pattern':
    case 'tuple_pattern':
    case 'list_pattern':
      return param.namedChildren.flatMap(parameterNames);
    default:
      // keyword_separator, positional_separator, comments
      return [];
  }
}

function resolveImportEdges(
  filePath: string,
  imports: ImportDeclaration[],
  options: PythonAnalyzerOptions
): ImportEdge[] {
  const edges = new Map<string, ImportEdge>();
  const { projectRoot, exists } = options;

  const resolve = (module: string, level: number): string | null =>
    resolvePythonImport({ module, level, fromFile: filePath, projectRoot }, exists);

  const add = (target: string | null, line: number): void => {
    if (!target || target === filePath || edges.has(target)) return;
    edges.set(target, { source: filePath, target, line });
  };

  for (const decl of imports) {
    const isFromImport = decl.names.length > 0 || decl.wildcard;

    if (!isFromImport) {
      add(resolve(decl.module, decl.level), decl.line);
      continue;
    }

    if (decl.module) {
      const target = resolve(decl.module, decl.level);
      add(target, decl.line);

      // from pkg import submodule
      if (target && isPackageInit(target)) {
        for (const name of decl.names) {
          add(resolve(`${decl.module}.${name}`, decl.level), decl.line);
        }
      }
      continue;
    }

    // from . import sibling: try the sibling module, else the package itself
    let fellBack = decl.wildcard;
    for (const name of decl.names) {
      const submodule = resolve(name, decl.level);
      if (submodule) {
        add(submodule, decl.line);
      } else {
        fellBack = true;
      }
    }
    if (fellBack) {
      add(resolve('', decl.level), decl.line);
    }
  }

  return Array.from(edges.values());
}

function sameNode(a: Parser.SyntaxNode, b: Parser.SyntaxNode): boolean {
  return a.startIndex === b.startIndex && a.endIndex === b.endIndex && a.type === b.type;
}

function countDots(prefix: string): number {
  let count = 0;
  for (const ch of prefix) {
    if (ch === '.') count++;
  }
  return count;
}

function lineOf(node: Parser.SyntaxNode): number {
  return node.startPosition.row + 1;
}
