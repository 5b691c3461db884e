/**
 * Common Zod Schemas - Shared value types for run options
 */

import { z } from 'zod';

// ============================================
// Paths
// ============================================

/**
 * Non-empty filesystem path.
 */
export const FilePathSchema = z.string().trim().min(1, 'Path must not be empty');

// ============================================
// Numbers
// ============================================

/**
 * Probability or fraction in [0, 1].
 */
export const FractionSchema = z.number().min(0).max(1);

/**
 * Non-negative integer count.
 */
export const CountSchema = z.number().int().nonnegative();

/**
 * Phred-scaled mapping quality (0-255).
 */
export const MappingQualitySchema = z.number().int().min(0).max(255);

/**
 * Engine thread count.
 */
export const ThreadCountSchema = z.number().int().positive();

// ============================================
// Helpers
// ============================================

/**
 * Flatten zod issues into "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}
