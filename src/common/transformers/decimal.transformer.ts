import { ValueTransformer } from 'typeorm';

/**
 * PostgreSQL returns DECIMAL columns as strings; expose them as numbers
 */
export const decimalTransformer: ValueTransformer = {
  to: (value: number | null | undefined) => value,
  from: (value: string | number | null) => (value === null ? null : Number(value)),
};
