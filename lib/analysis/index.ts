/**
 * @fileoverview Contract analysis entry points
 * @module lib/analysis
 */

export { analyzeContract, buildAnalysisResult, type AnalyzeContractInput } from './analyze-contract'
export { testModelConnection } from './connection'
export * from './scoring'
export { readUpload, resolveMimeType, apiKeySchema } from './upload'
