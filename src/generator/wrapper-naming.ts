/**
 * Wrapper names and collision checks
 */

import ts from 'typescript';
import { memberName, SETTER_NAME } from './eligibility.js';
import type { GeneratorOptions } from './types.js';

/**
 * Derives a wrapper name: `processDataCore → processData`,
 * `validate → validateLogged`. A method named exactly like the suffix keeps
 * it and gets the logged suffix.
 */
export function wrapperNameFor(
  methodName: string,
  options: Pick<GeneratorOptions, 'coreSuffix' | 'loggedSuffix'>
): string {
  const { coreSuffix, loggedSuffix } = options;
  if (coreSuffix.length > 0 && methodName.length > coreSuffix.length && methodName.endsWith(coreSuffix)) {
    return methodName.slice(0, -coreSuffix.length);
  }
  return `${methodName}${loggedSuffix}`;
}

/**
 * Every name a wrapper must not take: the class's own members (static and
 * instance, including constructor parameter properties), inherited instance
 * members and the generated setter. Members that only generated modules
 * declare are left out, so a second run sees the same names as the first.
 */
export function collectMemberNames(
  declaration: ts.ClassDeclaration,
  checker: ts.TypeChecker,
  isGenerated: (sourceFile: ts.SourceFile) => boolean
): Set<string> {
  const names = new Set<string>([SETTER_NAME]);

  for (const member of declaration.members) {
    const name = memberName(member);
    if (name !== undefined) {
      names.add(name);
    }
    if (ts.isConstructorDeclaration(member)) {
      for (const parameter of member.parameters) {
        if (ts.isParameterPropertyDeclaration(parameter, member) && ts.isIdentifier(parameter.name)) {
          names.add(parameter.name.text);
        }
      }
    }
  }

  const instanceType = checker.getTypeAtLocation(declaration.name ?? declaration);
  for (const property of checker.getPropertiesOfType(instanceType)) {
    const declarations = property.declarations ?? [];
    if (declarations.length === 0 || declarations.some(node => !isGenerated(node.getSourceFile()))) {
      names.add(property.getName());
    }
  }

  return names;
}
