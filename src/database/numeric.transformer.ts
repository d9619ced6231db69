import type { ValueTransformer } from 'typeorm';

/**
 * pg returns numeric columns as strings; amounts here are whole Toman and
 * stay well inside Number.MAX_SAFE_INTEGER.
 */
export const numericTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | null): number | null =>
    value === null ? null : Number(value),
};
