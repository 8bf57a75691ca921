export * from './languageDetector.js'
