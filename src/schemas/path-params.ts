/**
 * Zod schemas for URL path parameter validation
 *
 * Path parameters are interpolated into backend URLs, so they are
 * restricted to a safe character set before use.
 */

import { z } from 'zod';

/**
 * Diagram job ID
 * Format: alphanumeric, hyphens, underscores
 * Length: 1-128 characters
 *
 * Examples: "job-123", "6f1c2a9e-4b1d-4f7a-9c55-0e2b8d0c9f11"
 */
export const JobIdPathSchema = z.string()
  .min(1, 'Job ID cannot be empty')
  .max(128, 'Job ID too long')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Job ID must contain only alphanumeric characters, hyphens, and underscores');

/**
 * Presentation ID
 * Format: alphanumeric, hyphens, underscores
 * Length: 1-128 characters
 */
export const PresentationIdPathSchema = z.string()
  .min(1, 'Presentation ID cannot be empty')
  .max(128, 'Presentation ID too long')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Presentation ID must contain only alphanumeric characters, hyphens, and underscores');

/**
 * Grid dimension in backend grid units (text constraints)
 * Range: 1-32
 */
export const GridDimensionPathSchema = z.string()
  .regex(/^\d+$/, 'Grid dimension must be a positive integer')
  .transform((value) => Number(value))
  .pipe(z.number().int().min(1, 'Grid dimension must be at least 1').max(32, 'Grid dimension too large'));
