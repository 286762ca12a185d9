/**
 * @fileoverview Paragraph-boundary truncation for oversized contracts.
 *
 * When extracted text exceeds the token budget, this module cuts it at the
 * last paragraph that still fits, so the model never sees half a clause.
 *
 * @module lib/budget/truncation
 */

import { decode, encode } from 'gpt-tokenizer'
import { BUDGET_LIMITS } from './limits'

/**
 * Result of document truncation operation.
 */
export interface TruncationResult {
  /** Truncated text (or original if no truncation needed) */
  text: string
  /** Whether any truncation occurred */
  truncated: boolean
  /** Original document token count */
  originalTokens: number
  /** Token count after truncation */
  truncatedTokens: number
  /** Number of trailing paragraphs dropped */
  removedParagraphs: number
}

const PARAGRAPH_BREAK = /\n\s*\n/

/**
 * Truncates document at paragraph boundaries to fit within token budget.
 *
 * Strategy:
 * 1. Split on blank lines (PDF.js emits them between blocks)
 * 2. Include paragraphs from the start until the budget is exhausted
 * 3. If even the first paragraph is too large, cut it by tokens so the
 *    analysis still has SOME content
 *
 * @param text - Full extracted contract text
 * @param budget - Token budget limit (defaults to BUDGET_LIMITS.TOKEN_BUDGET)
 */
export function truncateToTokenBudget(
  text: string,
  budget: number = BUDGET_LIMITS.TOKEN_BUDGET
): TruncationResult {
  const originalTokens = encode(text).length

  // No truncation needed
  if (originalTokens <= budget) {
    return {
      text,
      truncated: false,
      originalTokens,
      truncatedTokens: originalTokens,
      removedParagraphs: 0,
    }
  }

  const paragraphs = text.split(PARAGRAPH_BREAK)
  const kept: string[] = []
  let accumulatedTokens = 0

  for (const paragraph of paragraphs) {
    const paragraphTokens = encode(paragraph).length
    if (accumulatedTokens + paragraphTokens > budget) {
      break
    }
    accumulatedTokens += paragraphTokens
    kept.push(paragraph)
  }

  // Edge case: first paragraph alone exceeds budget
  if (kept.length === 0) {
    const head = decode(encode(paragraphs[0]).slice(0, budget))
    return {
      text: head,
      truncated: true,
      originalTokens,
      truncatedTokens: encode(head).length,
      removedParagraphs: paragraphs.length - 1,
    }
  }

  const truncatedText = kept.join('\n\n')

  return {
    text: truncatedText,
    truncated: true,
    originalTokens,
    truncatedTokens: encode(truncatedText).length,
    removedParagraphs: paragraphs.length - kept.length,
  }
}
