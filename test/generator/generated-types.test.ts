import { describe, it, expect } from 'vitest';
import { generate, lines, onlySource, typeCheckGenerated } from '../helpers/test-program.js';

describe('Generated Module Types', () => {
  it('type-checks wrappers of plain classes with imported types', () => {
    const errors = typeCheckGenerated({
      'src/models/user.ts': lines('export interface User {', '  id: number;', '  name: string;', '}'),
      'src/services/user-service.ts': lines(
        "import { LogClass, Sensitive } from 'logweave';",
        "import type { User } from '../models/user.js';",
        '',
        '@LogClass()',
        'export class UserService {',
        '  getUserCore(id: number): User {',
        '    return { id, name: `user-${id}` };',
        '  }',
        '',
        '  loginCore(username: string, @Sensitive() password: string): boolean {',
        '    return password.length > 0;',
        '  }',
        '}'
      )
    });

    expect(errors).toEqual([]);
  });

  describe('Generic Classes', () => {
    const STORE = lines(
      "import { LogClass } from 'logweave';",
      '',
      '@LogClass()',
      'export class Store<T extends { id: number }> {',
      '  private readonly items: T[] = [];',
      '',
      '  hasCore<K extends keyof T>(key: K): boolean {',
      '    return this.items.some(item => item[key] !== undefined);',
      '  }',
      '',
      '  findCore<K extends keyof T>(key: K, value: T[K]): T | undefined {',
      '    return this.items.find(item => item[key] === value);',
      '  }',
      '}'
    );

    it('installs wrappers generic over class and method type parameters', () => {
      const text = onlySource(generate({ 'src/store.ts': STORE })).text;

      expect(text).toContain(
        lines(
          "Object.defineProperty(Store.prototype, 'has', {",
          '  value: function has<T extends { id: number }, K extends keyof T>(this: Store<T>, key: K): boolean {'
        )
      );
      expect(text).toContain('    find<K extends keyof T>(key: K, value: T[K]): T | undefined;');
    });

    it('type-checks them', () => {
      expect(typeCheckGenerated({ 'src/store.ts': STORE })).toEqual([]);
    });

    it('type-checks generic classes with imported constraints and rest parameters', () => {
      const errors = typeCheckGenerated({
        'src/entity.ts': lines('export interface Entity {', '  id: number;', '}'),
        'src/repository.ts': lines(
          "import { LogMethod } from 'logweave';",
          "import type { Entity } from './entity.js';",
          '',
          'export class Repository<T extends Entity> {',
          '  @LogMethod()',
          '  findCore<K extends keyof T>(key: K, ...values: T[K][]): T | undefined {',
          '    return undefined;',
          '  }',
          '}'
        )
      });

      expect(errors).toEqual([]);
    });
  });

  it('type-checks namespaces, renamed, skipped, clipped and masked values', () => {
    const errors = typeCheckGenerated({
      'src/billing/invoice-service.ts': lines(
        "import * as lw from 'logweave';",
        '',
        'export namespace Billing {',
        '  export class InvoiceService {',
        "    @lw.LogMethod({ logLevel: 'debug', logExecutionTime: false })",
        '    async sendCore(',
        "      @lw.LogParameter('recipient') to: string,",
        '      @lw.LogParameter({ skip: true }) body: string,',
        '      @lw.LogParameter({ maxLength: 8 }) subject: string',
        '    ): Promise<boolean> {',
        '      return to.length > 0 && body.length > 0 && subject.length > 0;',
        '    }',
        '',
        '    @lw.LogMethod()',
        '    @lw.Sensitive({ showLength: true })',
        '    token(): string {',
        "      return 'test-token';",
        '    }',
        '',
        '    @lw.LogMethod({ logExceptions: false })',
        '    @lw.LogResult({ skip: true })',
        '    render(): string {',
        "      return '';",
        '    }',
        '  }',
        '}'
      )
    });

    expect(errors).toEqual([]);
  });

  it('type-checks optional, defaulted and destructured parameters', () => {
    const errors = typeCheckGenerated({
      'src/decimal.ts': lines('export default class Decimal {', '  constructor(readonly value: number) {}', '}'),
      'src/geo.ts': lines('export interface Point {', '  x: number;', '  y: number;', '}'),
      'src/config.ts': lines(
        "import { LogMethod } from 'logweave';",
        "import Decimal from './decimal.js';",
        "import type * as geo from './geo.js';",
        '',
        'export interface Options {',
        '  host: string;',
        '  port: number;',
        '}',
        '',
        'export class Gateway {',
        '  @LogMethod()',
        '  configureCore({ host, port }: Options, retries = 3, verbose?: boolean): void {',
        '    if (verbose === true) {',
        '      throw new Error(`${host}:${port} after ${retries}`);',
        '    }',
        '  }',
        '',
        '  @LogMethod()',
        '  priceCore(amount: Decimal, origin: geo.Point): Decimal {',
        '    return new Decimal(amount.value + origin.x);',
        '  }',
        '}'
      )
    });

    expect(errors).toEqual([]);
  });

  it('type-checks private, void and level-overriding methods', () => {
    const errors = typeCheckGenerated({
      'src/report-service.ts': lines(
        "import { LogClass, LogMethod, LogException } from 'logweave';",
        '',
        "@LogClass({ logLevel: 'debug', logParameters: false })",
        'export class ReportService {',
        "  @LogMethod({ logLevel: 'warn' })",
        '  buildCore(name: string): string {',
        '    return name;',
        '  }',
        '',
        "  @LogException('error')",
        '  publishCore(name: string): void {',
        '    this.hashCore(name);',
        '  }',
        '',
        '  private hashCore(value: string): string {',
        '    return value;',
        '  }',
        '}'
      )
    });

    expect(errors).toEqual([]);
  });

  it('type-checks escaped masks and locals renamed around parameters', () => {
    const mask = "it's a \\ line\nbreak\u2028sep\u0000end";
    const maskSource = JSON.stringify(mask).replace(/\u2028/g, '\\u2028');

    const errors = typeCheckGenerated({
      'src/vault.ts': lines(
        "import { LogMethod, Sensitive } from 'logweave';",
        '',
        'export class Vault {',
        '  @LogMethod()',
        `  unlockCore(@Sensitive(${maskSource}) pin: string): boolean {`,
        '    return pin.length > 0;',
        '  }',
        '}'
      ),
      'src/mailer.ts': lines(
        "import { LogMethod } from 'logweave';",
        '',
        'export class Mailer {',
        '  @LogMethod()',
        '  async sendCore(logger: string, logweave: number, result: boolean): Promise<void> {',
        '    if (!result) {',
        '      throw new RangeError(`${logger} ${logweave}`);',
        '    }',
        '  }',
        '}'
      )
    });

    expect(errors).toEqual([]);
  });
});
