/**
 * Effective configuration of instrumented methods
 *
 * Fields merge one at a time: the method's `@LogMethod` value when it sets
 * the field, else the class's `@LogClass` value, else the hard default.
 * Parameter, result, exception and sensitivity directives are folded in, so
 * the emitter works from one frozen record per method.
 */

import type ts from 'typescript';
import { isLogLevel } from '../logger/logger-config.js';
import type { LogLevel } from '../logger/types.js';
import { resolveSensitivity, type ResolvedSensitivity } from '../directives/sensitive-registry.js';
import {
  DEFAULT_INSTRUMENTATION,
  type InstrumentationDirective,
  type LogMethodOptions,
  type LogParameterOptions,
  type LogResultOptions,
  type SensitiveOptions
} from '../directives/types.js';
import type { DirectiveArguments, DirectiveReader } from './directive-reader.js';
import type { InstrumentableMethod } from './eligibility.js';
import { callableParameters, parameterNames } from './signature.js';
import type { ParameterPlan, ResolvedMethodConfig, ResultPlan } from './types.js';

const UNBOUNDED = -1;

function booleanField(args: DirectiveArguments, field: string): boolean | undefined {
  const value = args.fields.get(field);
  if (value === undefined || typeof value === 'boolean') {
    return value;
  }
  args.invalid(field, 'a boolean');
  return undefined;
}

function stringField(args: DirectiveArguments, field: string): string | undefined {
  const value = args.fields.get(field);
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  args.invalid(field, 'a string');
  return undefined;
}

function lengthField(args: DirectiveArguments, field: string): number | undefined {
  const value = args.fields.get(field);
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'number' && Number.isInteger(value) && value >= UNBOUNDED) {
    return value;
  }
  args.invalid(field, 'an integer of at least -1');
  return undefined;
}

function levelValue(args: DirectiveArguments, field: string, value: unknown): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string' && isLogLevel(value)) {
    return value;
  }
  args.invalid(field, 'a log level');
  return undefined;
}

/**
 * Reads `@LogClass` or `@LogMethod` arguments, including the bare level
 * shorthand
 */
export function readInstrumentation(args: DirectiveArguments): LogMethodOptions {
  const options: LogMethodOptions = {};
  const level = args.shorthand !== undefined
    ? levelValue(args, 'level', args.shorthand)
    : levelValue(args, 'logLevel', args.fields.get('logLevel'));

  if (level !== undefined) options.logLevel = level;

  const logExecutionTime = booleanField(args, 'logExecutionTime');
  if (logExecutionTime !== undefined) options.logExecutionTime = logExecutionTime;

  const logParameters = booleanField(args, 'logParameters');
  if (logParameters !== undefined) options.logParameters = logParameters;

  const logReturnValue = booleanField(args, 'logReturnValue');
  if (logReturnValue !== undefined) options.logReturnValue = logReturnValue;

  const logExceptions = booleanField(args, 'logExceptions');
  if (logExceptions !== undefined) options.logExceptions = logExceptions;

  if (args.directive === 'LogMethod') {
    const skip = booleanField(args, 'skip');
    if (skip !== undefined) options.skip = skip;
  }

  return options;
}

function readParameterOptions(args: DirectiveArguments): LogParameterOptions {
  const options: LogParameterOptions = {};
  if (args.shorthand !== undefined) {
    if (typeof args.shorthand === 'string') {
      options.name = args.shorthand;
    } else {
      args.invalid('name', 'a string');
    }
  }

  const skip = booleanField(args, 'skip');
  if (skip !== undefined) options.skip = skip;

  const name = stringField(args, 'name');
  if (name !== undefined) options.name = name;

  const maxLength = lengthField(args, 'maxLength');
  if (maxLength !== undefined) options.maxLength = maxLength;

  return options;
}

function readResultOptions(args: DirectiveArguments): LogResultOptions {
  const options: LogResultOptions = {};
  const skip = booleanField(args, 'skip');
  if (skip !== undefined) options.skip = skip;

  const maxLength = lengthField(args, 'maxLength');
  if (maxLength !== undefined) options.maxLength = maxLength;

  return options;
}

function readSensitiveOptions(args: DirectiveArguments): SensitiveOptions {
  const options: SensitiveOptions = {};
  if (args.shorthand !== undefined) {
    if (typeof args.shorthand === 'string') {
      options.maskValue = args.shorthand;
    } else {
      args.invalid('maskValue', 'a string');
    }
  }

  const maskValue = stringField(args, 'maskValue');
  if (maskValue !== undefined) options.maskValue = maskValue;

  const showLength = booleanField(args, 'showLength');
  if (showLength !== undefined) options.showLength = showLength;

  return options;
}

/**
 * Resolves the settings of one method, or `undefined` when the method is
 * not instrumented (no class or method directive, or `skip: true`)
 *
 * @param classOptions - The class's `@LogClass` options, `undefined` without one
 */
export function resolveMethodConfig(
  method: InstrumentableMethod,
  classOptions: InstrumentationDirective | undefined,
  reader: DirectiveReader
): ResolvedMethodConfig | undefined {
  const methodDirective = reader.find(method, 'LogMethod');
  if (classOptions === undefined && methodDirective === undefined) {
    return undefined;
  }

  const methodOptions = methodDirective !== undefined
    ? readInstrumentation(reader.readArguments(methodDirective, 'LogMethod'))
    : {};
  if (methodOptions.skip === true) {
    return undefined;
  }

  const merged = {
    logLevel: methodOptions.logLevel ?? classOptions?.logLevel ?? DEFAULT_INSTRUMENTATION.logLevel,
    logExecutionTime:
      methodOptions.logExecutionTime ?? classOptions?.logExecutionTime ?? DEFAULT_INSTRUMENTATION.logExecutionTime,
    logParameters: methodOptions.logParameters ?? classOptions?.logParameters ?? DEFAULT_INSTRUMENTATION.logParameters,
    logReturnValue:
      methodOptions.logReturnValue ?? classOptions?.logReturnValue ?? DEFAULT_INSTRUMENTATION.logReturnValue,
    logExceptions: methodOptions.logExceptions ?? classOptions?.logExceptions ?? DEFAULT_INSTRUMENTATION.logExceptions
  };

  const exceptionDirective = reader.find(method, 'LogException');
  const exceptionLevel = exceptionDirective !== undefined
    ? readInstrumentation(reader.readArguments(exceptionDirective, 'LogException')).logLevel
    : undefined;

  const parameters = callableParameters(method);
  const names = parameterNames(parameters);

  return Object.freeze({
    ...merged,
    exceptionLevel: exceptionLevel ?? merged.logLevel,
    parameters: Object.freeze(
      parameters.map((parameter, index) => planParameter(parameter, names[index] ?? `arg${index}`, reader))
    ),
    result: planResult(method, reader)
  });
}

/** Two logged parameters that would share a key in the parameter map */
export interface DuplicateParameterKey {
  readonly key: string;
  readonly first: string;
  readonly second: string;
}

/**
 * Finds the first key claimed by two logged parameters
 */
export function findDuplicateParameterKey(config: ResolvedMethodConfig): DuplicateParameterKey | undefined {
  if (!config.logParameters) {
    return undefined;
  }
  const owners = new Map<string, string>();
  for (const parameter of config.parameters) {
    if (parameter.skip) continue;
    const owner = owners.get(parameter.key);
    if (owner !== undefined) {
      return { key: parameter.key, first: owner, second: parameter.name };
    }
    owners.set(parameter.key, parameter.name);
  }
  return undefined;
}

function sensitivityOf(node: ts.Node, reader: DirectiveReader): ResolvedSensitivity | undefined {
  const directive = reader.find(node, 'Sensitive');
  return directive !== undefined
    ? Object.freeze(resolveSensitivity(readSensitiveOptions(reader.readArguments(directive, 'Sensitive'))))
    : undefined;
}

function planParameter(parameter: ts.ParameterDeclaration, name: string, reader: DirectiveReader): ParameterPlan {
  const directive = reader.find(parameter, 'LogParameter');
  const options = directive !== undefined ? readParameterOptions(reader.readArguments(directive, 'LogParameter')) : {};
  const sensitivity = sensitivityOf(parameter, reader);

  return Object.freeze({
    name,
    key: options.name ?? name,
    skip: options.skip ?? false,
    maxLength: options.maxLength ?? UNBOUNDED,
    ...(sensitivity !== undefined ? { sensitivity } : {})
  });
}

function planResult(method: InstrumentableMethod, reader: DirectiveReader): ResultPlan {
  const directive = reader.find(method, 'LogResult');
  const options = directive !== undefined ? readResultOptions(reader.readArguments(directive, 'LogResult')) : {};
  const sensitivity = sensitivityOf(method, reader);

  return Object.freeze({
    skip: options.skip ?? false,
    maxLength: options.maxLength ?? UNBOUNDED,
    ...(sensitivity !== undefined ? { sensitivity } : {})
  });
}
