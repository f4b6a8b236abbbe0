import { BigIntScalar, DecimalScalar } from '../scalars';
import { Query } from './queries';
import { Subscription } from './subscriptions';

export const resolvers = {
  // Custom scalars
  BigInt: BigIntScalar,
  Decimal: DecimalScalar,

  Query,
  Subscription,
};
