import { describe, it, expect, beforeEach } from 'vitest';
import ts from 'typescript';
import * as runtime from '../../src/index.js';
import { attachMethodLogger, createMethodLogger, isMethodLoggerAware, type MethodLoggerAware } from '../../src/index.js';
import { RecordingSink } from '../helpers/recording-sink.js';
import { generate, lines, onlySource } from '../helpers/test-program.js';
import { TEST_CONSTANTS } from '../test-constants.js';

const { SECRETS } = TEST_CONSTANTS;

const ACCOUNT_SERVICE = lines(
  "import { LogClass, LogException, Sensitive } from 'logweave';",
  '',
  'export class Session {',
  "  user = '';",
  '',
  '  @Sensitive()',
  "  token = 'test-token';",
  '',
  '  constructor(user: string) {',
  '    this.user = user;',
  '  }',
  '}',
  '',
  "@LogClass({ logLevel: 'debug' })",
  'export class AccountService {',
  '  loginCore(user: string, @Sensitive() password: string): Session {',
  "    if (password !== 'test-password') {",
  '      throw new Error(`Invalid credentials for ${user}`);',
  '    }',
  '    return new Session(user);',
  '  }',
  '',
  '  async loadCore(id: number): Promise<string> {',
  '    return `account-${id}`;',
  '  }',
  '',
  "  @LogException('critical')",
  '  async removeCore(id: number): Promise<void> {',
  '    throw new RangeError(`No account ${id}`);',
  '  }',
  '}'
);

type ModuleExports = Record<string, unknown>;

/** Evaluates transpiled CommonJS, resolving `logweave` to the runtime under test */
function evaluateModule(source: string, modules: ReadonlyMap<string, ModuleExports>): ModuleExports {
  const { outputText } = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2022,
      experimentalDecorators: true
    }
  });

  const exports: ModuleExports = {};
  const requireModule = (specifier: string): unknown => {
    if (specifier === 'logweave') {
      return runtime;
    }
    const loaded = modules.get(specifier);
    if (loaded === undefined) {
      throw new Error(`Cannot find module '${specifier}'`);
    }
    return loaded;
  };

  const evaluate = new Function('require', 'module', 'exports', outputText);
  Reflect.apply(evaluate, undefined, [requireModule, { exports }, exports]);
  return exports;
}

interface LoggedAccountService extends MethodLoggerAware {
  login(user: string, password: string): unknown;
  load(id: number): Promise<string>;
  remove(id: number): Promise<void>;
}

function isLoggedAccountService(value: unknown): value is LoggedAccountService {
  return (
    isMethodLoggerAware(value) &&
    typeof Reflect.get(value, 'login') === 'function' &&
    typeof Reflect.get(value, 'load') === 'function' &&
    typeof Reflect.get(value, 'remove') === 'function'
  );
}

describe('Generated Wrappers (end to end)', () => {
  const generated = onlySource(generate({ 'src/account-service.ts': ACCOUNT_SERVICE }));
  const sourceExports = evaluateModule(ACCOUNT_SERVICE, new Map());
  evaluateModule(generated.text, new Map([['./account-service.js', sourceExports]]));

  const createService = (): LoggedAccountService => {
    const serviceClass = sourceExports.AccountService;
    if (typeof serviceClass !== 'function') {
      throw new Error('AccountService was not exported');
    }
    const instance: unknown = Reflect.construct(serviceClass, []);
    if (!isLoggedAccountService(instance)) {
      throw new Error('AccountService was not instrumented');
    }
    return instance;
  };

  let sink: RecordingSink;
  let service: LoggedAccountService;

  beforeEach(() => {
    sink = new RecordingSink();
    service = createService();
    const logger = createMethodLogger(
      {
        entryFormat: '{ClassName}.{MethodName}({Parameters})',
        exitFormat: '{ClassName}.{MethodName} -> {ReturnValue}',
        exceptionFormat: '{ClassName}.{MethodName} failed: {ExceptionType} - {ExceptionMessage}'
      },
      sink
    );
    expect(attachMethodLogger(service, logger)).toBe(true);
  });

  it('describes the instrumented type', () => {
    expect(service[runtime.LOGGED_TYPE]).toEqual({ namespace: 'account-service', className: 'AccountService' });
  });

  it('logs entry and exit with masked parameters and properties', () => {
    service.login(SECRETS.USERNAME, SECRETS.PASSWORD);

    expect(sink.messages).toEqual([
      'AccountService.login(user="alice", password="***SENSITIVE***")',
      'AccountService.login -> Session { user: "alice", token: ***SENSITIVE*** }'
    ]);
    expect(sink.records.map(record => record.level)).toEqual(['debug', 'debug']);
    expect(sink.records.map(record => record.category)).toEqual(['AccountService', 'AccountService']);
  });

  it('logs and rethrows exceptions', () => {
    expect(() => service.login(SECRETS.USERNAME, 'wrong-password')).toThrow(
      new Error('Invalid credentials for alice')
    );

    expect(sink.messages).toEqual([
      'AccountService.login(user="alice", password="***SENSITIVE***")',
      'AccountService.login failed: Error - Invalid credentials for alice'
    ]);
    expect(sink.records[1]?.level).toBe('debug');
    expect(sink.records[1]?.error).toBeInstanceOf(Error);
  });

  it('logs the resolved value of asynchronous methods', async () => {
    await expect(service.load(7)).resolves.toBe('account-7');

    expect(sink.messages).toEqual(['AccountService.load(id=7)', 'AccountService.load -> "account-7"']);
  });

  it('logs rejections at the exception level', async () => {
    await expect(service.remove(3)).rejects.toThrow(new RangeError('No account 3'));

    expect(sink.messages).toEqual([
      'AccountService.remove(id=3)',
      'AccountService.remove failed: RangeError - No account 3'
    ]);
    expect(sink.records.map(record => record.level)).toEqual(['debug', 'critical']);
  });

  it('runs without logging until a logger is attached', async () => {
    const bare = createService();

    await expect(bare.load(1)).resolves.toBe('account-1');
    expect(sink.records).toEqual([]);
  });

  it('does not attach loggers that exclude the class', () => {
    const filtered = createMethodLogger({ excludedClasses: ['Account*'] }, sink);

    expect(attachMethodLogger(createService(), filtered)).toBe(false);
  });
});
