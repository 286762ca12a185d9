/**
 * Shared configuration objects for analysis UI components.
 *
 * Colors, labels and icons for risk levels, risk types and error codes.
 */

import type * as React from "react"
import {
  CheckCircleIcon,
  AlertTriangleIcon,
  AlertCircleIcon,
  BanknoteIcon,
  ShieldAlertIcon,
  DoorOpenIcon,
  LightbulbIcon,
  HelpCircleIcon,
  KeyRoundIcon,
  FileWarningIcon,
  ServerCrashIcon,
  TimerIcon,
  SettingsIcon,
} from "lucide-react"
import type { RiskLevel, RiskType } from "@/agents/types"
import type { ErrorCode } from "@/lib/errors"

interface ColorConfig {
  label: string
  bgColor: string
  textColor: string
  borderColor: string
  icon: React.ElementType
}

export const riskConfig: Record<RiskLevel, ColorConfig & { description: string }> = {
  low: {
    label: "Low",
    bgColor: "oklch(0.90 0.08 175)",
    textColor: "oklch(0.45 0.14 175)",
    borderColor: "oklch(0.85 0.10 175)",
    icon: CheckCircleIcon,
    description: "Within market norms",
  },
  medium: {
    label: "Medium",
    bgColor: "oklch(0.90 0.08 65)",
    textColor: "oklch(0.50 0.14 65)",
    borderColor: "oklch(0.85 0.10 65)",
    icon: AlertTriangleIcon,
    description: "Review recommended",
  },
  high: {
    label: "High",
    bgColor: "oklch(0.90 0.08 25)",
    textColor: "oklch(0.50 0.14 25)",
    borderColor: "oklch(0.85 0.10 25)",
    icon: AlertCircleIcon,
    description: "Negotiation recommended",
  },
}

export const riskTypeConfig: Record<RiskType, ColorConfig> = {
  Financial: {
    label: "Financial",
    bgColor: "oklch(0.90 0.10 150)",
    textColor: "oklch(0.45 0.15 150)",
    borderColor: "oklch(0.85 0.12 150)",
    icon: BanknoteIcon,
  },
  Liability: {
    label: "Liability",
    bgColor: "oklch(0.90 0.10 25)",
    textColor: "oklch(0.45 0.15 25)",
    borderColor: "oklch(0.85 0.12 25)",
    icon: ShieldAlertIcon,
  },
  Termination: {
    label: "Termination",
    bgColor: "oklch(0.90 0.10 65)",
    textColor: "oklch(0.45 0.15 65)",
    borderColor: "oklch(0.85 0.12 65)",
    icon: DoorOpenIcon,
  },
  IP: {
    label: "IP",
    bgColor: "oklch(0.90 0.10 300)",
    textColor: "oklch(0.45 0.15 300)",
    borderColor: "oklch(0.85 0.12 300)",
    icon: LightbulbIcon,
  },
  Ambiguity: {
    label: "Ambiguity",
    bgColor: "oklch(0.92 0.01 280)",
    textColor: "oklch(0.45 0.01 280)",
    borderColor: "oklch(0.88 0.02 280)",
    icon: HelpCircleIcon,
  },
}

interface ErrorDisplay {
  title: string
  hint: string
  icon: React.ElementType
}

const BAD_INPUT: ErrorDisplay = {
  title: "Invalid upload",
  hint: "Upload a single PDF under 10MB and 50 pages.",
  icon: FileWarningIcon,
}

const EXTRACTION_FAILED: ErrorDisplay = {
  title: "Could not read the contract",
  hint: "Make sure the PDF is not password protected or scanned, then try again.",
  icon: FileWarningIcon,
}

/** Title and hint per error code shown by the error panel */
export const errorConfig: Record<ErrorCode, ErrorDisplay> = {
  VALIDATION_ERROR: BAD_INPUT,
  ENCRYPTED_DOCUMENT: EXTRACTION_FAILED,
  CORRUPT_DOCUMENT: EXTRACTION_FAILED,
  EMPTY_DOCUMENT: EXTRACTION_FAILED,
  CONFIGURATION_ERROR: {
    title: "Model access is not configured",
    hint: "Set AI_GATEWAY_API_KEY in .env.local or enter a key above.",
    icon: SettingsIcon,
  },
  INVALID_API_KEY: {
    title: "API key rejected",
    hint: "Check the key and use Test connection before analyzing again.",
    icon: KeyRoundIcon,
  },
  RATE_LIMITED: {
    title: "Rate limited",
    hint: "The model provider is busy. Wait a minute and try again.",
    icon: TimerIcon,
  },
  MALFORMED_MODEL_OUTPUT: {
    title: "Unexpected model response",
    hint: "The model answered in the wrong format. Running the analysis again usually works.",
    icon: ServerCrashIcon,
  },
  LLM_FAILED: {
    title: "Model request failed",
    hint: "The model provider returned an error. Try again shortly.",
    icon: ServerCrashIcon,
  },
  INTERNAL_ERROR: {
    title: "Something went wrong",
    hint: "An unexpected error occurred. Try again, and check the server logs if it persists.",
    icon: AlertCircleIcon,
  },
}
