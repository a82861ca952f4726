/**
 * Wrapper emitter
 *
 * Turns a planned class into the text of its logging module:
 *
 * ```typescript
 * // <auto-generated />
 * import * as logweave from 'logweave';
 * import { UserService } from './user-service.js';
 *
 * declare module './user-service.js' {
 *   interface UserService extends logweave.MethodLoggerAware {
 *     getUser(id: number): string;
 *   }
 * }
 *
 * Object.defineProperty(UserService.prototype, logweave.LOGGED_TYPE, { ... });
 * Object.defineProperty(UserService.prototype, 'setMethodLogger', { value: function setMethodLogger(...) { ... }, ... });
 * Object.defineProperty(UserService.prototype, 'getUser', { value: function getUser(this: UserService, id: number): string { ... }, ... });
 * ```
 *
 * Methods are installed with `Object.defineProperty`, not assigned: a generic
 * class's `prototype` is `X<any>`, which a wrapper generic over the class's
 * type parameters is not assignable to. Callers see the typed signature
 * through the augmentation.
 *
 * The emitter only prints; every decision (names, signatures, masks) was
 * made while planning. User-provided strings reach the output through
 * {@link toStringLiteral} and nowhere else.
 */

import { GENERATED_HEADER } from './discovery.js';
import type { ReproducedSignature } from './signature.js';
import { SourceWriter } from './source-writer.js';
import { toPropertyKey, toStringLiteral } from './string-literal.js';
import { renderTypeImports, type TypeImport } from './type-imports.js';
import type { ParameterPlan, ResolvedMethodConfig, ResultPlan } from './types.js';

/** One wrapper to emit */
export interface WrapperPlan {
  /** Method the wrapper calls */
  readonly methodName: string;
  readonly wrapperName: string;
  readonly signature: ReproducedSignature;
  readonly config: ResolvedMethodConfig;
}

/** Everything needed to print one class's logging module */
export interface ClassPlan {
  readonly className: string;

  /** Enclosing namespaces, outermost first */
  readonly namespacePath: readonly string[];

  /** Namespace recorded in the type descriptor */
  readonly loggedNamespace: string;

  /** Source path shown in the header */
  readonly sourceDisplayName: string;

  /** Relative specifier of the source module, e.g. `./user-service.js` */
  readonly sourceModuleSpecifier: string;

  readonly runtimeModule: string;

  /** Local name of the runtime namespace import */
  readonly runtimeAlias: string;

  /** Class type parameter declarations, e.g. `T extends Entity` */
  readonly classTypeParameters: readonly string[];

  /** Class type parameter names, e.g. `T` */
  readonly classTypeArguments: readonly string[];

  readonly typeImports: readonly TypeImport[];
  readonly wrappers: readonly WrapperPlan[];
}

/** Name the module imports from the source (the outermost namespace, or the class) */
export function rootName(plan: Pick<ClassPlan, 'className' | 'namespacePath'>): string {
  return plan.namespacePath[0] ?? plan.className;
}

function qualifiedName(plan: ClassPlan): string {
  return [...plan.namespacePath, plan.className].join('.');
}

function instanceType(plan: ClassPlan): string {
  const args = plan.classTypeArguments;
  return args.length > 0 ? `${qualifiedName(plan)}<${args.join(', ')}>` : qualifiedName(plan);
}

/**
 * Picks a name not in `taken`, prefixing underscores as needed
 */
export function uniqueName(base: string, taken: ReadonlySet<string>): string {
  let name = base;
  while (taken.has(name)) {
    name = `_${name}`;
  }
  return name;
}

/**
 * Prints the logging module of a planned class
 */
export function emitClassModule(plan: ClassPlan): string {
  const writer = new SourceWriter();
  const lw = plan.runtimeAlias;
  const classRef = qualifiedName(plan);

  writer
    .line(GENERATED_HEADER)
    .line(`// Logging wrappers for ${plan.className} in ${plan.sourceDisplayName}. Regenerate instead of editing.`)
    .line()
    .line(`import * as ${lw} from ${toStringLiteral(plan.runtimeModule)};`)
    .lines(renderTypeImports(plan.typeImports))
    .line(`import { ${rootName(plan)} } from ${toStringLiteral(plan.sourceModuleSpecifier)};`)
    .line();

  writeAugmentation(writer, plan);
  writer.line();

  writer
    .block(`Object.defineProperty(${classRef}.prototype, ${lw}.LOGGED_TYPE, {`, () => {
      writer
        .line(
          `value: Object.freeze({ namespace: ${toStringLiteral(plan.loggedNamespace)}, className: ${toStringLiteral(plan.className)} }),`
        )
        .line('configurable: true');
    }, '});')
    .line();

  writeMethod(
    writer,
    classRef,
    'setMethodLogger',
    `function setMethodLogger(this: ${lw}.MethodLoggerAware, logger: ${lw}.MethodLogger): void {`,
    () => {
      writer.line(`this[${lw}.METHOD_LOGGER] = logger;`);
    }
  );

  for (const wrapper of plan.wrappers) {
    writer.line();
    writeWrapper(writer, plan, wrapper);
  }

  return writer.toString();
}

function writeAugmentation(writer: SourceWriter, plan: ClassPlan): void {
  const typeParameters = plan.classTypeParameters.length > 0 ? `<${plan.classTypeParameters.join(', ')}>` : '';

  const writeInterface = (): void => {
    writer.block(`interface ${plan.className}${typeParameters} extends ${plan.runtimeAlias}.MethodLoggerAware {`, () => {
      for (const { wrapperName, signature } of plan.wrappers) {
        const parameters = signature.parameters.map(parameter => parameter.text).join(', ');
        writer.line(`${wrapperName}${signature.typeParameters}(${parameters}): ${signature.returnType};`);
      }
    });
  };

  const writeNamespaces = (depth: number): void => {
    const namespace = plan.namespacePath[depth];
    if (namespace === undefined) {
      writeInterface();
      return;
    }
    writer.block(`namespace ${namespace} {`, () => writeNamespaces(depth + 1));
  };

  writer.block(`declare module ${toStringLiteral(plan.sourceModuleSpecifier)} {`, () => writeNamespaces(0));
}

/** Installs `function` as a non-enumerable prototype method, like a class method */
function writeMethod(writer: SourceWriter, classRef: string, name: string, header: string, body: () => void): void {
  writer.block(`Object.defineProperty(${classRef}.prototype, ${toStringLiteral(name)}, {`, () => {
    writer.block(`value: ${header}`, body, '},').line('writable: true,').line('configurable: true');
  }, '});');
}

function functionTypeParameters(plan: ClassPlan, signature: ReproducedSignature): string {
  const method = signature.typeParameters.length > 0 ? signature.typeParameters.slice(1, -1) : '';
  const all = [...plan.classTypeParameters, ...(method.length > 0 ? [method] : [])];
  return all.length > 0 ? `<${all.join(', ')}>` : '';
}

function parameterValue(parameter: ParameterPlan, lw: string): string {
  const { sensitivity } = parameter;
  if (sensitivity !== undefined) {
    return sensitivity.showLength
      ? `${lw}.maskedLength(${toStringLiteral(sensitivity.maskValue)}, ${parameter.name})`
      : toStringLiteral(sensitivity.maskValue);
  }
  if (parameter.maxLength >= 0) {
    return `${lw}.clipValue(${parameter.name}, ${parameter.maxLength})`;
  }
  return parameter.name;
}

function parameterMap(config: ResolvedMethodConfig, lw: string): string {
  if (!config.logParameters) {
    return '{}';
  }
  const entries = config.parameters
    .filter(parameter => !parameter.skip)
    .map(parameter => {
      const value = parameterValue(parameter, lw);
      const key = toPropertyKey(parameter.key);
      return key === value ? key : `${key}: ${value}`;
    });
  return entries.length > 0 ? `{ ${entries.join(', ')} }` : '{}';
}

function resultValue(config: ResolvedMethodConfig, result: ResultPlan, variable: string, lw: string): string {
  if (!config.logReturnValue || result.skip) {
    return 'undefined';
  }
  const { sensitivity } = result;
  if (sensitivity !== undefined) {
    return sensitivity.showLength
      ? `${lw}.maskedLength(${toStringLiteral(sensitivity.maskValue)}, ${variable})`
      : toStringLiteral(sensitivity.maskValue);
  }
  if (result.maxLength >= 0) {
    return `${lw}.clipValue(${variable}, ${result.maxLength})`;
  }
  return variable;
}

function writeWrapper(writer: SourceWriter, plan: ClassPlan, wrapper: WrapperPlan): void {
  const { config, signature, wrapperName, methodName } = wrapper;
  const lw = plan.runtimeAlias;
  const taken = new Set(signature.parameters.map(parameter => parameter.name));
  const logger = uniqueName('logger', taken);
  const stopwatch = uniqueName('stopwatch', taken);
  const result = uniqueName('result', taken);
  const error = uniqueName('error', taken);

  const className = toStringLiteral(plan.className);
  const loggedName = toStringLiteral(wrapperName);
  const level = toStringLiteral(config.logLevel);
  const elapsed = config.logExecutionTime ? `${stopwatch}.elapsedMs()` : 'undefined';
  const args = signature.parameters.map(parameter => (parameter.rest ? `...${parameter.name}` : parameter.name)).join(', ');
  const call = `this[${toStringLiteral(methodName)}](${args})`;
  const parameters = [`this: ${instanceType(plan)}`, ...signature.parameters.map(parameter => parameter.text)].join(', ');
  const header =
    `${signature.isAsync ? 'async ' : ''}function ${wrapperName}` +
    `${functionTypeParameters(plan, signature)}(${parameters}): ${signature.returnType} {`;

  const writeSuccess = (): void => {
    writer
      .line(`const ${result} = ${signature.isAsync ? 'await ' : ''}${call};`)
      .line(`${logger}.logExit(${className}, ${loggedName}, ${resultValue(config, config.result, result, lw)}, ${elapsed}, ${level});`)
      .line(`return ${result};`);
  };

  writeMethod(writer, qualifiedName(plan), wrapperName, header, () => {
    writer
      .line(`const ${logger} = this[${lw}.METHOD_LOGGER];`)
      .block(`if (${logger} === undefined) {`, () => {
        writer.line(`return ${call};`);
      })
      .line()
      .line(`${logger}.logEntry(${className}, ${loggedName}, ${parameterMap(config, lw)}, ${level});`);

    if (config.logExecutionTime) {
      writer.line(`const ${stopwatch} = ${lw}.startStopwatch();`);
    }

    if (!config.logExceptions) {
      writeSuccess();
      return;
    }

    writer
      .block('try {', writeSuccess, `} catch (${error}) {`)
      .indent(() => {
        writer
          .line(`${logger}.logException(${className}, ${loggedName}, ${error}, ${elapsed}, ${toStringLiteral(config.exceptionLevel)});`)
          .line(`throw ${error};`);
      })
      .line('}');
  });
}
