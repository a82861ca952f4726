/**
 * Shared constants for test files to avoid string duplication
 */

export const TEST_CONSTANTS = {
  // Classes and methods used by runtime tests
  CLASSES: {
    MY_CLASS: 'MyClass',
    USER_SERVICE: 'UserService',
    ORDER_SERVICE: 'OrderService',
    HEALTH_SERVICE: 'HealthService'
  },

  METHODS: {
    MY_METHOD: 'MyMethod',
    LOGIN: 'login',
    GET_USER: 'getUser'
  },

  // Log Levels
  LEVELS: {
    TRACE: 'trace' as const,
    DEBUG: 'debug' as const,
    INFO: 'info' as const,
    WARN: 'warn' as const,
    ERROR: 'error' as const,
    CRITICAL: 'critical' as const,
    NONE: 'none' as const
  },

  // Message templates
  TEMPLATES: {
    ENTRY_PLAIN: 'Entering {ClassName}.{MethodName}',
    ENTRY_WITH_PARAMETERS: 'Entering {ClassName}.{MethodName} with {Parameters}',
    EXIT_WITH_RESULT: 'Exiting {ClassName}.{MethodName} returned {ReturnValue}'
  },

  // Placeholder credentials, never real ones
  SECRETS: {
    USERNAME: 'alice',
    PASSWORD: 'test-password',
    DEFAULT_MASK: '***SENSITIVE***'
  },

  // Fixed clock value for deterministic timestamps (2024-01-02T03:04:05.678Z)
  TIMESTAMP: 1704164645678
} as const;
