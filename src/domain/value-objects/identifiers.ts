/**
 * Typed identifiers.
 *
 * Branded strings keep a cart id from being passed where a session id is
 * expected. They are plain strings at runtime.
 */

import { v7 as uuidv7 } from 'uuid';
import { ValidationError } from '../../shared/errors/domain.errors';

declare const brand: unique symbol;

export type Id<K extends string> = string & { readonly [brand]: K };

export type CheckoutSessionId = Id<'CheckoutSessionId'>;
export type CartId = Id<'CartId'>;
export type CustomerId = Id<'CustomerId'>;
export type ProductId = Id<'ProductId'>;
export type LineItemId = Id<'LineItemId'>;

function isId<K extends string>(value: string): value is Id<K> {
  return value.trim().length > 0;
}

function parseId<K extends string>(field: string, value: string): Id<K> {
  if (!isId<K>(value)) {
    throw ValidationError.forField(field, `${field} must not be blank`);
  }
  return value;
}

function idFactory<K extends string>(field: string) {
  return {
    of: (value: string): Id<K> => parseId<K>(field, value),
    generate: (): Id<K> => parseId<K>(field, uuidv7()),
  };
}

export const CheckoutSessionId = idFactory<'CheckoutSessionId'>('sessionId');
export const CartId = idFactory<'CartId'>('cartId');
export const CustomerId = idFactory<'CustomerId'>('customerId');
export const ProductId = idFactory<'ProductId'>('productId');
export const LineItemId = idFactory<'LineItemId'>('lineItemId');
