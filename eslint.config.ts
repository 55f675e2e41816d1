// ==============================================================================
// ESLINT FLAT CONFIG
// Uses plugin presets with minimal overrides.
// ==============================================================================

import stylistic from '@stylistic/eslint-plugin'
import importX from 'eslint-plugin-import-x'
import jsdoc from 'eslint-plugin-jsdoc'
import sonarjs from 'eslint-plugin-sonarjs'
import tseslint from 'typescript-eslint'

import type { Linter } from 'eslint'

type Rules = Linter.RulesRecord

// ----------------------------------------------------------
// STYLISTIC CONFIG (customize preset)
// ----------------------------------------------------------

// Library sources keep semicolons; tools and config files go without
const stylisticConfig = stylistic.configs.customize({
  indent: 2, quotes: 'single', semi: false, commaDangle: 'always-multiline', braceStyle: '1tbs',
})

const sourceStylisticConfig = stylistic.configs.customize({
  indent: 2, quotes: 'single', semi: true, commaDangle: 'only-multiline', braceStyle: '1tbs',
})

// ----------------------------------------------------------
// RULE SETS
// ----------------------------------------------------------

const stylisticOverrides: Rules = {
  '@stylistic/no-multi-spaces': ['error', { ignoreEOLComments: true }],
  '@stylistic/quote-props': 'off',
  '@stylistic/arrow-parens': 'off',
  '@stylistic/max-statements-per-line': 'off',
  '@stylistic/indent-binary-ops': 'off',
  '@stylistic/padded-blocks': 'off',
  '@stylistic/member-delimiter-style': ['error', { multiline: { delimiter: 'none' }, singleline: { delimiter: 'semi' } }],
}

const sourceRules: Rules = {
  '@stylistic/quotes': 'off',
  'object-shorthand': ['error', 'never'],
  'no-use-before-define': ['error', { functions: false, classes: true, variables: true }],
  'prefer-const': 'off',
  'max-depth': ['warn', 4],
  'max-nested-callbacks': ['warn', 3],
  'max-lines-per-function': ['warn', { max: 100, skipBlankLines: true, skipComments: true }],
  'max-params': ['warn', 5],
}

const jsdocRules: Rules = {
  'jsdoc/require-jsdoc': ['warn', { require: { FunctionDeclaration: true } }],
  'jsdoc/check-syntax': 'error',
  'jsdoc/check-types': 'error',
  'jsdoc/valid-types': 'error',
  'jsdoc/check-param-names': 'error',
  'jsdoc/check-tag-names': ['error', { definedTags: ['category', 'internal', 'reads'] }],
  'jsdoc/require-returns': 'off',
  'jsdoc/require-description': ['error', { checkConstructors: false, contexts: ['FunctionDeclaration'] }],
  'jsdoc/require-param-description': 'warn',
  'jsdoc/require-returns-description': 'off',
  'jsdoc/require-param-type': 'warn',
  'jsdoc/require-returns-type': 'warn',
  'jsdoc/check-alignment': 'error',
  'jsdoc/check-indentation': 'off',
  'jsdoc/empty-tags': 'error',
  'jsdoc/no-undefined-types': 'off',
}

const qualityRules: Rules = {
  'eqeqeq': ['error', 'always', { null: 'ignore' }],
  'no-var': 'error',
  'no-console': 'off',
  'no-constant-condition': ['error', { checkLoops: false }],
  'no-empty': 'error',
  'no-throw-literal': 'error',
  'complexity': ['warn', 15],
  'sonarjs/cognitive-complexity': ['warn', 15],
  'sonarjs/no-identical-functions': 'warn',
  'sonarjs/no-duplicated-branches': 'error',
  'sonarjs/no-collapsible-if': 'warn',
  'sonarjs/no-redundant-jump': 'error',
  'sonarjs/no-same-line-conditional': 'error',
  'sonarjs/no-collection-size-mischeck': 'error',
  'sonarjs/prefer-single-boolean-return': 'warn',
  'sonarjs/no-small-switch': 'warn',
  'sonarjs/no-all-duplicated-branches': 'error',
}

const tsRules: Rules = {
  '@typescript-eslint/no-unused-vars': ['error', { argsIgnorePattern: '^_', varsIgnorePattern: '^_', caughtErrorsIgnorePattern: '^_' }],
  '@typescript-eslint/no-explicit-any': 'error',
}

const importRules: Rules = {
  'import-x/order': ['error', {
    'groups': ['builtin', 'external', 'internal', ['parent', 'sibling', 'index'], 'type'],
    'newlines-between': 'always',
    'alphabetize': { order: 'asc', caseInsensitive: true },
  }],
}

// Disable rules for tests/tools
const relaxedRules: Rules = {
  'object-shorthand': 'off',
  'max-depth': 'off', 'max-nested-callbacks': 'off', 'max-lines-per-function': 'off',
  'max-params': 'off', 'complexity': 'off',
  'sonarjs/cognitive-complexity': 'off', 'sonarjs/no-identical-functions': 'off',
  'sonarjs/no-collapsible-if': 'off', 'sonarjs/no-duplicated-branches': 'off',
}

// ==============================================================================
// MAIN CONFIG
// ==============================================================================

export default tseslint.config(
  { ignores: ['node_modules/**', 'dist/**', 'coverage/**'] },

  // LIBRARY SOURCES
  {
    files: ['src/**/*.ts'],
    ignores: ['src/**/*.test.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: ['./tsconfig.json'], ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'jsdoc': jsdoc, 'sonarjs': sonarjs },
    rules: {
      ...sourceStylisticConfig.rules, ...stylisticOverrides, ...sourceRules, ...jsdocRules, ...qualityRules, ...tsRules,
      '@stylistic/member-delimiter-style': 'error',
      'jsdoc/require-param-type': 'off', 'jsdoc/require-returns-type': 'off',
    },
  },

  // TEST FILES
  {
    files: ['src/**/*.test.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: ['./tsconfig.json'], ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'sonarjs': sonarjs },
    rules: {
      ...sourceStylisticConfig.rules, ...stylisticOverrides, ...qualityRules, ...tsRules, ...relaxedRules,
      '@stylistic/quotes': 'off', '@stylistic/member-delimiter-style': 'error',
    },
  },

  // TOOLS
  {
    files: ['tools/**/*.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: ['./tsconfig.json'], ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX, 'sonarjs': sonarjs },
    rules: { ...stylisticConfig.rules, ...stylisticOverrides, ...qualityRules, ...tsRules, ...importRules, ...relaxedRules },
  },

  // CONFIG FILES
  {
    files: ['*.config.ts', '*.config.js'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: { project: null, ecmaVersion: 2022, sourceType: 'module' },
    },
    plugins: { '@stylistic': stylistic, '@typescript-eslint': tseslint.plugin, 'import-x': importX },
    rules: {
      ...stylisticConfig.rules, ...stylisticOverrides, ...importRules,
      '@typescript-eslint/no-unused-vars': 'off',
    },
  },
)
