export * from './clause-extractor'
export * from './risk-scorer'

/** Legal disclaimer for all outputs */
export const LEGAL_DISCLAIMER =
  'This analysis is AI-generated and does not constitute legal advice. ' +
  'Consult a qualified attorney before signing or renegotiating a contract.'
