import { GraphQLScalarType, Kind } from 'graphql';
import { Decimal } from 'decimal.js';

function parseBigInt(value: string): bigint {
  if (!/^-?\d+$/.test(value)) {
    throw new Error(`Invalid BigInt value: ${value}`);
  }
  return BigInt(value);
}

// BigInt scalar (string representation for safety with large numbers)
export const BigIntScalar = new GraphQLScalarType<bigint, string>({
  name: 'BigInt',
  description: 'Integer amount in smallest units, represented as string',
  serialize(value: unknown): string {
    if (typeof value === 'bigint') {
      return value.toString();
    }
    if (Decimal.isDecimal(value)) {
      return value.toFixed(0);
    }
    if (typeof value === 'string') {
      return parseBigInt(value).toString();
    }
    if (typeof value === 'number' && Number.isInteger(value)) {
      return value.toString();
    }
    throw new Error('Invalid BigInt value');
  },
  parseValue(value: unknown): bigint {
    if (typeof value === 'string') {
      return parseBigInt(value);
    }
    if (typeof value === 'number' && Number.isSafeInteger(value)) {
      return BigInt(value);
    }
    throw new Error('Invalid BigInt input');
  },
  parseLiteral(ast): bigint {
    if (ast.kind === Kind.STRING || ast.kind === Kind.INT) {
      return parseBigInt(ast.value);
    }
    throw new Error('Invalid BigInt literal');
  },
});

// Decimal scalar (string representation for precision)
export const DecimalScalar = new GraphQLScalarType<string, string>({
  name: 'Decimal',
  description: 'Decimal number with arbitrary precision, represented as string',
  serialize(value: unknown): string {
    if (Decimal.isDecimal(value)) {
      return value.toFixed();
    }
    if (typeof value === 'string' || typeof value === 'number') {
      return new Decimal(value).toFixed();
    }
    throw new Error('Invalid Decimal value');
  },
  parseValue(value: unknown): string {
    if (typeof value === 'string' || typeof value === 'number') {
      return new Decimal(value).toFixed();
    }
    throw new Error('Invalid Decimal input');
  },
  parseLiteral(ast): string {
    if (ast.kind === Kind.STRING || ast.kind === Kind.FLOAT || ast.kind === Kind.INT) {
      return new Decimal(ast.value).toFixed();
    }
    throw new Error('Invalid Decimal literal');
  },
});
