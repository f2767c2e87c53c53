/**
 * Checkout DTOs
 *
 * Request and response shapes of the checkout API. Structural checks
 * live here; the domain still enforces its own rules (subtotal matching
 * the line items, allowed providers, step order).
 */

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import {
  IsArray,
  IsEmail,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  Min,
  ValidateNested,
} from 'class-validator';
import { Type } from 'class-transformer';
import { ALL_STEPS, CheckoutStep } from '../../../domain/value-objects/checkout-step';
import { MoneyJson } from '../../../domain/value-objects/money';

// ============================================================================
// REQUEST DTOs
// ============================================================================

export class StartLineItemDto {
  @ApiProperty({ description: 'Catalog product id' })
  @IsString()
  @IsNotEmpty()
  productId!: string;

  @ApiProperty({ description: 'Product name as shown in the cart', maxLength: 200 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  productName!: string;

  @ApiProperty({ description: 'Unit price in minor units (cents)' })
  @IsInt()
  @Min(0)
  @Type(() => Number)
  unitPriceMinor!: number;

  @ApiProperty({ description: 'Quantity', minimum: 1 })
  @IsInt()
  @Min(1)
  @Type(() => Number)
  quantity!: number;
}

export class StartCheckoutDto {
  @ApiProperty({ description: 'Cart the checkout is started from' })
  @IsString()
  @IsNotEmpty()
  cartId!: string;

  @ApiProperty({ description: 'Customer owning the cart' })
  @IsString()
  @IsNotEmpty()
  customerId!: string;

  @ApiPropertyOptional({ description: 'ISO 4217 code, defaults to the shop currency' })
  @Matches(/^[A-Z]{3}$/)
  @IsOptional()
  currency?: string;

  @ApiProperty({ type: [StartLineItemDto] })
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => StartLineItemDto)
  lineItems!: StartLineItemDto[];

  @ApiProperty({ description: 'Cart subtotal in minor units' })
  @IsInt()
  @Min(0)
  @Type(() => Number)
  subtotalMinor!: number;
}

export class SubmitBuyerInfoDto {
  @ApiProperty()
  @IsEmail()
  email!: string;

  @ApiProperty({ maxLength: 100 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  firstName!: string;

  @ApiProperty({ maxLength: 100 })
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  lastName!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  phone!: string;
}

export class DeliveryAddressDto {
  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  street!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  streetLine2?: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  city!: string;

  @ApiProperty()
  @IsString()
  @IsNotEmpty()
  postalCode!: string;

  @ApiProperty({ description: 'Country code, e.g. DE' })
  @IsString()
  @IsNotEmpty()
  country!: string;

  @ApiPropertyOptional()
  @IsString()
  @IsOptional()
  state?: string;
}

export class SubmitDeliveryDto {
  @ApiProperty({ type: DeliveryAddressDto })
  @ValidateNested()
  @Type(() => DeliveryAddressDto)
  address!: DeliveryAddressDto;

  @ApiProperty({ description: 'Id from GET /checkout/shipping-options' })
  @IsString()
  @IsNotEmpty()
  shippingOptionId!: string;
}

export class SubmitPaymentDto {
  @ApiProperty({ description: 'Id from GET /checkout/payment-providers' })
  @IsString()
  @IsNotEmpty()
  providerId!: string;

  @ApiPropertyOptional({ description: 'Provider-side reference, e.g. a token' })
  @IsString()
  @IsOptional()
  providerReference?: string;
}

export class CompleteCheckoutDto {
  @ApiPropertyOptional({ description: 'Order number assigned downstream' })
  @IsString()
  @IsOptional()
  orderReference?: string;
}

// ============================================================================
// QUERY DTOs
// ============================================================================

export class StepAccessQueryDto {
  @ApiProperty({
    description: 'Step name (e.g. "delivery") or view path (e.g. "/checkout/delivery")',
  })
  @IsString()
  @IsNotEmpty()
  step!: string;
}

// ============================================================================
// RESPONSE DTOs
// ============================================================================

export class CheckoutSessionResponseDto {
  @ApiProperty() id!: string;
  @ApiProperty() cartId!: string;
  @ApiProperty() customerId!: string;
  @ApiProperty() currency!: string;
  @ApiProperty({ enum: ALL_STEPS }) step!: CheckoutStep;
  @ApiProperty() status!: string;
  @ApiProperty() isTerminal!: boolean;
  @ApiProperty({ description: 'Where the buyer continues' }) entryPath!: string;
  @ApiProperty() version!: number;
  @ApiProperty() createdAt!: string;
  @ApiProperty() lastActivityAt!: string;
}

export class StartCheckoutResponseDto {
  @ApiProperty({ type: CheckoutSessionResponseDto })
  session!: CheckoutSessionResponseDto;

  @ApiProperty({ description: 'False when an open session for the cart was reused' })
  created!: boolean;
}

export class StepAccessResponseDto {
  @ApiProperty({ enum: ['allow', 'redirect'] })
  decision!: 'allow' | 'redirect';

  @ApiPropertyOptional({ description: 'Redirect path, set when decision is redirect' })
  redirectTo?: string;
}

export class ShippingOptionResponseDto {
  @ApiProperty() id!: string;
  @ApiProperty() name!: string;
  @ApiProperty() estimatedDelivery!: string;
  @ApiProperty() cost!: MoneyJson;
}

export class PaymentProvidersResponseDto {
  @ApiProperty({ type: [String] })
  providers!: string[];
}
