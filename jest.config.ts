import type { Config } from 'jest'

export default async (): Promise<Config> => {
  return {
    preset: 'ts-jest',
    testEnvironment: 'node',
    verbose: false,
    testMatch: ['<rootDir>/tests/**/*.test.ts']
  }
}
