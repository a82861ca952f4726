/**
 * Reproduces method signatures for wrapper methods
 *
 * Annotated types are copied as written. Unannotated ones are printed by the
 * checker. Destructured parameters have no name to forward, so they become
 * `arg<index>`.
 */

import ts from 'typescript';
import type { InstrumentableMethod } from './eligibility.js';

const TYPE_FORMAT = ts.TypeFormatFlags.NoTruncation;

/** One parameter of a reproduced signature */
export interface ReproducedParameter {
  /** Name in the wrapper, also used to forward the argument */
  readonly name: string;

  /** Declaration text, e.g. `...ids?: number[]` */
  readonly text: string;

  readonly rest: boolean;
}

/**
 * Signature of a wrapper, ready to print
 */
export interface ReproducedSignature {
  /** `<T extends Base>`, or empty */
  readonly typeParameters: string;

  readonly parameters: readonly ReproducedParameter[];

  readonly returnType: string;

  /** Declared `async`, or returns a `Promise` */
  readonly isAsync: boolean;

  /** Every type text above, for import resolution */
  readonly typeTexts: readonly string[];
}

/** Parameters of a method, without a `this` parameter */
export function callableParameters(method: ts.SignatureDeclaration): ts.ParameterDeclaration[] {
  return method.parameters.filter(parameter => !(ts.isIdentifier(parameter.name) && parameter.name.text === 'this'));
}

/**
 * Wrapper-side names of parameters: the declared identifier, or `arg<index>`
 * for a destructuring pattern, made unique against the other names
 */
export function parameterNames(parameters: readonly ts.ParameterDeclaration[]): string[] {
  const declared = new Set(parameters.flatMap(parameter => (ts.isIdentifier(parameter.name) ? [parameter.name.text] : [])));

  return parameters.map((parameter, index) => {
    if (ts.isIdentifier(parameter.name)) {
      return parameter.name.text;
    }
    let name = `arg${index}`;
    while (declared.has(name)) {
      name = `_${name}`;
    }
    declared.add(name);
    return name;
  });
}

/**
 * Optional flags per parameter. An initialised parameter is optional only
 * when nothing required follows it.
 */
function optionalFlags(parameters: readonly ts.ParameterDeclaration[]): boolean[] {
  const flags = new Array<boolean>(parameters.length).fill(false);
  let tailIsOptional = true;

  for (let index = parameters.length - 1; index >= 0; index--) {
    const parameter = parameters[index];
    if (parameter === undefined) continue;

    if (parameter.dotDotDotToken !== undefined) {
      continue;
    }
    const optional: boolean = parameter.questionToken !== undefined || (parameter.initializer !== undefined && tailIsOptional);
    flags[index] = optional;
    tailIsOptional = tailIsOptional && optional;
  }
  return flags;
}

function hasAsyncModifier(method: ts.MethodDeclaration): boolean {
  return ts.getModifiers(method)?.some(modifier => modifier.kind === ts.SyntaxKind.AsyncKeyword) ?? false;
}

/**
 * Builds the wrapper signature of `method`
 */
export function reproduceSignature(method: InstrumentableMethod, checker: ts.TypeChecker): ReproducedSignature {
  const sourceFile = method.getSourceFile();
  const signature = checker.getSignatureFromDeclaration(method);
  const parameters = callableParameters(method);
  const names = parameterNames(parameters);
  const optional = optionalFlags(parameters);
  const typeTexts: string[] = [];

  const reproduced = parameters.map((parameter, index): ReproducedParameter => {
    const symbol = signature?.parameters[index];
    const typeText = parameter.type !== undefined
      ? parameter.type.getText(sourceFile)
      : symbol !== undefined
        ? checker.typeToString(checker.getTypeOfSymbolAtLocation(symbol, method), method, TYPE_FORMAT)
        : 'unknown';
    typeTexts.push(typeText);

    const rest = parameter.dotDotDotToken !== undefined;
    const name = names[index] ?? `arg${index}`;
    return {
      name,
      rest,
      text: `${rest ? '...' : ''}${name}${optional[index] === true ? '?' : ''}: ${typeText}`
    };
  });

  const returnType = signature !== undefined ? checker.getReturnTypeOfSignature(signature) : undefined;
  const returnTypeText = method.type !== undefined
    ? method.type.getText(sourceFile)
    : returnType !== undefined
      ? checker.typeToString(returnType, method, TYPE_FORMAT)
      : 'unknown';
  typeTexts.push(returnTypeText);

  const typeParameters = method.typeParameters !== undefined
    ? `<${method.typeParameters.map(parameter => parameter.getText(sourceFile)).join(', ')}>`
    : '';
  typeTexts.push(...typeParameterTypeTexts(method.typeParameters, sourceFile));

  return {
    typeParameters,
    parameters: reproduced,
    returnType: returnTypeText,
    isAsync: hasAsyncModifier(method) || returnType?.getSymbol()?.getName() === 'Promise',
    typeTexts
  };
}

/**
 * Constraint and default texts of type parameter declarations
 */
export function typeParameterTypeTexts(
  typeParameters: readonly ts.TypeParameterDeclaration[] | undefined,
  sourceFile: ts.SourceFile
): string[] {
  return (typeParameters ?? []).flatMap(parameter =>
    [parameter.constraint, parameter.default].flatMap(node => (node !== undefined ? [node.getText(sourceFile)] : []))
  );
}
