/**
 * Vitest Workspace Configuration
 *
 * Stratifies tests into two categories:
 * - unit: Fast, isolated tests (*.unit.test.ts)
 * - integration: Tests that drive a whole scan through fakes (*.integration.test.ts)
 *
 * Usage:
 *   npm run test:unit
 *   npm run test:integration
 */
export default [
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'unit',
      include: [
        'core/src/__tests__/**/*.unit.test.ts',
        'config/src/__tests__/**/*.unit.test.ts',
        'scan/src/__tests__/**/*.unit.test.ts',
      ],
      exclude: ['**/node_modules/**', '**/dist/**'],
    },
  },
  {
    extends: './vitest.shared.ts',
    test: {
      name: 'integration',
      include: [
        'core/src/__tests__/**/*.integration.test.ts',
        'config/src/__tests__/**/*.integration.test.ts',
        'scan/src/__tests__/**/*.integration.test.ts',
      ],
      exclude: ['**/node_modules/**', '**/dist/**'],
      testTimeout: 15000,
    },
  },
];
