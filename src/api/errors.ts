import { GraphQLFormattedError } from 'graphql';
import { unwrapResolverError } from '@apollo/server/errors';
import { isEngineError } from '../errors';

/**
 * Exposes engine error codes to clients as `extensions.code`.
 */
export function formatEngineError(formatted: GraphQLFormattedError, error: unknown): GraphQLFormattedError {
  const original = unwrapResolverError(error);
  if (!isEngineError(original)) {
    return formatted;
  }
  return {
    ...formatted,
    extensions: {
      ...formatted.extensions,
      code: original.code,
      details: original.details,
    },
  };
}
