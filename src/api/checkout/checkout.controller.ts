/**
 * Checkout Controller
 *
 * REST API for checkout sessions. Translates HTTP into commands and read
 * model queries; no checkout rules live here.
 *
 * Every successful command drops the cached view of its session.
 */

import {
  BadRequestException,
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { ConfigService } from '@nestjs/config';
import {
  CommandBus,
  CommandFactory,
  DEFAULT_MAX_ATTEMPTS,
  TRANSIENT_FAILURES,
} from '../../commands/bus/command-bus';
import {
  createAbandonCheckoutCommand,
  createCompleteCheckoutCommand,
  createConfirmCheckoutCommand,
  createEnterReviewCommand,
  createStartCheckoutCommand,
  createSubmitBuyerInfoCommand,
  createSubmitDeliveryCommand,
  createSubmitPaymentCommand,
} from '../../commands/checkout.commands';
import {
  ConfirmCheckoutExtra,
  SessionTransitionResult,
  StartCheckoutResult,
} from '../../commands/handlers';
import { CommandResult } from '../../shared/types/command.types';
import { AggregateTypes } from '../../shared/types/event.types';
import { RequestContext } from '../../shared/context/request-context';
import { CheckoutConfig } from '../../config';
import { AuditService } from '../../audit/audit.service';
import { AuditLogEntry, DomainEvent } from '../../db/types';
import { CheckoutSessionReadModel } from '../../read-models/checkout-session.read-model';
import { CheckoutSessionView } from '../../read-models/checkout-session.view';
import { ShippingCatalog } from '../../domain/services/shipping-catalog';
import {
  stepForPath,
  targetPath,
  validateAccess,
} from '../../domain/services/step-access.validator';
import {
  ProgressStep,
  isCheckoutStep,
  isProgressStep,
} from '../../domain/value-objects/checkout-step';
import { ShippingOptionJson } from '../../domain/value-objects/shipping-option';
import { CUSTOMER_ID_HEADER } from '../../utils/constants';
import { mapErrorToException } from './command-error.mapper';
import {
  CheckoutSessionResponseDto,
  CompleteCheckoutDto,
  PaymentProvidersResponseDto,
  ShippingOptionResponseDto,
  StartCheckoutDto,
  StartCheckoutResponseDto,
  StepAccessQueryDto,
  StepAccessResponseDto,
  SubmitBuyerInfoDto,
  SubmitDeliveryDto,
  SubmitPaymentDto,
} from './dto/checkout.dto';

/**
 * Accepts a step name ("delivery") or a view path ("/checkout/delivery").
 */
export function parseRequestedStep(value: string): ProgressStep | undefined {
  const trimmed = value.trim();
  if (isCheckoutStep(trimmed)) {
    return isProgressStep(trimmed) ? trimmed : undefined;
  }
  return stepForPath(trimmed);
}

@ApiTags('Checkout')
@ApiHeader({ name: CUSTOMER_ID_HEADER, required: false })
@Controller('checkout')
export class CheckoutController {
  private readonly logger = new Logger(CheckoutController.name);
  private readonly paymentProviders: string[];

  constructor(
    private readonly commandBus: CommandBus,
    private readonly readModel: CheckoutSessionReadModel,
    private readonly auditService: AuditService,
    private readonly shippingCatalog: ShippingCatalog,
    configService: ConfigService,
  ) {
    this.paymentProviders =
      configService.getOrThrow<CheckoutConfig>('checkout').paymentProviders;
  }

  // ============================================================================
  // COMMAND ENDPOINTS (Write Operations)
  // ============================================================================

  /**
   * Start checkout for a cart, or resume the cart's open session.
   */
  @Post('sessions')
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: 'Start (or resume) checkout for a cart' })
  @ApiResponse({ status: 201, type: StartCheckoutResponseDto })
  @ApiResponse({ status: 400, description: 'Validation failed' })
  async startCheckout(@Body() dto: StartCheckoutDto): Promise<StartCheckoutResult> {
    const command = createStartCheckoutCommand(
      {
        cartId: dto.cartId,
        customerId: dto.customerId,
        currency: dto.currency,
        lineItems: dto.lineItems.map((item) => ({
          productId: item.productId,
          productName: item.productName,
          unitPriceMinor: item.unitPriceMinor,
          quantity: item.quantity,
        })),
        subtotalMinor: dto.subtotalMinor,
      },
      CommandFactory.currentMetadata(),
    );

    const result = await this.commandBus.execute<StartCheckoutResult>(command);
    const data = this.unwrap(result);
    await this.readModel.invalidateCache(data.session.id);
    return data;
  }

  @Put('sessions/:sessionId/buyer-info')
  @ApiOperation({ summary: 'Submit buyer information' })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  @ApiResponse({ status: 409, description: 'Step out of order or session closed' })
  async submitBuyerInfo(
    @Param('sessionId') sessionId: string,
    @Body() dto: SubmitBuyerInfoDto,
  ): Promise<CheckoutSessionView> {
    const command = createSubmitBuyerInfoCommand(
      {
        sessionId,
        email: dto.email,
        firstName: dto.firstName,
        lastName: dto.lastName,
        phone: dto.phone,
      },
      CommandFactory.currentMetadata(),
    );
    return this.transition(sessionId, await this.commandBus.execute<SessionTransitionResult>(command));
  }

  @Put('sessions/:sessionId/delivery')
  @ApiOperation({ summary: 'Submit delivery address and shipping option' })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid address or unknown shipping option' })
  @ApiResponse({ status: 409, description: 'Step out of order or session closed' })
  async submitDelivery(
    @Param('sessionId') sessionId: string,
    @Body() dto: SubmitDeliveryDto,
  ): Promise<CheckoutSessionView> {
    const command = createSubmitDeliveryCommand(
      {
        sessionId,
        address: {
          street: dto.address.street,
          streetLine2: dto.address.streetLine2,
          city: dto.address.city,
          postalCode: dto.address.postalCode,
          country: dto.address.country,
          state: dto.address.state,
        },
        shippingOptionId: dto.shippingOptionId,
      },
      CommandFactory.currentMetadata(),
    );
    return this.transition(sessionId, await this.commandBus.execute<SessionTransitionResult>(command));
  }

  @Put('sessions/:sessionId/payment')
  @ApiOperation({ summary: 'Select a payment provider' })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  @ApiResponse({ status: 400, description: 'Unsupported payment provider' })
  @ApiResponse({ status: 409, description: 'Step out of order or session closed' })
  async submitPayment(
    @Param('sessionId') sessionId: string,
    @Body() dto: SubmitPaymentDto,
  ): Promise<CheckoutSessionView> {
    const command = createSubmitPaymentCommand(
      {
        sessionId,
        providerId: dto.providerId,
        providerReference: dto.providerReference,
      },
      CommandFactory.currentMetadata(),
    );
    return this.transition(sessionId, await this.commandBus.execute<SessionTransitionResult>(command));
  }

  @Post('sessions/:sessionId/review')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Enter the review step' })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  async enterReview(@Param('sessionId') sessionId: string): Promise<CheckoutSessionView> {
    const command = createEnterReviewCommand({ sessionId }, CommandFactory.currentMetadata());
    return this.transition(sessionId, await this.commandBus.execute<SessionTransitionResult>(command));
  }

  /**
   * Confirm against current prices and stock. Transient failures (article
   * data timeout, lost update) are retried once before reaching the caller.
   */
  @Post('sessions/:sessionId/confirm')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Confirm the order against current prices and stock' })
  @ApiResponse({ status: 200, description: 'Confirmed session and any price changes' })
  @ApiResponse({ status: 422, description: 'Items unavailable, out of stock or repriced' })
  @ApiResponse({ status: 503, description: 'Article data unavailable' })
  async confirmCheckout(
    @Param('sessionId') sessionId: string,
  ): Promise<SessionTransitionResult & ConfirmCheckoutExtra> {
    const command = createConfirmCheckoutCommand(
      { sessionId },
      CommandFactory.currentMetadata(),
    );
    const result = await this.commandBus.execute<
      SessionTransitionResult & ConfirmCheckoutExtra
    >(command, { retryOn: TRANSIENT_FAILURES, maxAttempts: DEFAULT_MAX_ATTEMPTS });

    const data = this.unwrap(result);
    await this.readModel.invalidateCache(sessionId);
    return data;
  }

  @Post('sessions/:sessionId/complete')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Mark a confirmed checkout as completed' })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  async completeCheckout(
    @Param('sessionId') sessionId: string,
    @Body() dto: CompleteCheckoutDto,
  ): Promise<CheckoutSessionView> {
    const command = createCompleteCheckoutCommand(
      { sessionId, orderReference: dto.orderReference },
      CommandFactory.currentMetadata(),
    );
    return this.transition(sessionId, await this.commandBus.execute<SessionTransitionResult>(command));
  }

  @Post('sessions/:sessionId/abandon')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Abandon a checkout' })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  async abandonCheckout(@Param('sessionId') sessionId: string): Promise<CheckoutSessionView> {
    const command = createAbandonCheckoutCommand({ sessionId }, CommandFactory.currentMetadata());
    return this.transition(sessionId, await this.commandBus.execute<SessionTransitionResult>(command));
  }

  // ============================================================================
  // QUERY ENDPOINTS (Read Operations)
  // ============================================================================

  @Get('sessions/active')
  @ApiOperation({ summary: "The calling customer's open checkout session" })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  @ApiResponse({ status: 404, description: 'No open session' })
  async getActiveSession(
    @Headers(CUSTOMER_ID_HEADER) customerId: string | undefined,
  ): Promise<CheckoutSessionView> {
    const trimmed = customerId?.trim();
    if (!trimmed) {
      throw new BadRequestException(`Missing ${CUSTOMER_ID_HEADER} header`);
    }
    const view = await this.readModel.getActiveSessionView(
      trimmed,
      RequestContext.getCorrelationId(),
    );
    if (!view) {
      throw new NotFoundException('No open checkout session');
    }
    return view;
  }

  @Get('sessions/:sessionId')
  @ApiOperation({ summary: 'Get a checkout session' })
  @ApiResponse({ status: 200, type: CheckoutSessionResponseDto })
  @ApiResponse({ status: 404, description: 'Session not found' })
  async getSession(@Param('sessionId') sessionId: string): Promise<CheckoutSessionView> {
    const view = await this.readModel.getSessionView(
      sessionId,
      RequestContext.getCorrelationId(),
    );
    if (!view) {
      throw new NotFoundException(`Checkout session '${sessionId}' not found`);
    }
    return view;
  }

  /**
   * Whether the caller may view a step of this session, or where to go.
   * An unknown session redirects to the cart rather than failing.
   */
  @Get('sessions/:sessionId/access')
  @ApiOperation({ summary: 'Check access to a checkout step' })
  @ApiResponse({ status: 200, type: StepAccessResponseDto })
  @ApiResponse({ status: 400, description: 'Unknown step' })
  async checkStepAccess(
    @Param('sessionId') sessionId: string,
    @Query() query: StepAccessQueryDto,
  ): Promise<StepAccessResponseDto> {
    const requested = parseRequestedStep(query.step);
    if (!requested) {
      throw new BadRequestException(`Unknown checkout step '${query.step}'`);
    }

    const view = await this.readModel.getSessionView(
      sessionId,
      RequestContext.getCorrelationId(),
    );
    const decision = validateAccess(view ? { currentStep: view.step } : null, requested);

    if (decision.kind === 'allow') {
      return { decision: 'allow' };
    }
    this.logger.debug({
      message: 'Step access redirected',
      sessionId,
      requested,
      target: decision.target,
    });
    return { decision: 'redirect', redirectTo: targetPath(decision.target) };
  }

  @Get('sessions/:sessionId/history')
  @ApiOperation({ summary: 'Event history of a checkout session' })
  async getHistory(@Param('sessionId') sessionId: string): Promise<DomainEvent[]> {
    return this.readModel.getSessionHistory(sessionId);
  }

  @Get('sessions/:sessionId/audit')
  @ApiOperation({ summary: 'Audit trail of a checkout session' })
  async getAuditTrail(@Param('sessionId') sessionId: string): Promise<AuditLogEntry[]> {
    return this.auditService.getEntityAuditTrail(AggregateTypes.CHECKOUT_SESSION, sessionId);
  }

  @Get('shipping-options')
  @ApiOperation({ summary: 'Shipping options offered at the delivery step' })
  @ApiResponse({ status: 200, type: [ShippingOptionResponseDto] })
  listShippingOptions(): ShippingOptionJson[] {
    return this.shippingCatalog.list().map((option) => option.toJSON());
  }

  @Get('payment-providers')
  @ApiOperation({ summary: 'Payment providers accepted at the payment step' })
  @ApiResponse({ status: 200, type: PaymentProvidersResponseDto })
  listPaymentProviders(): PaymentProvidersResponseDto {
    return { providers: [...this.paymentProviders] };
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private unwrap<T>(result: CommandResult<T>): T {
    if (result.success === false) {
      throw mapErrorToException(result.error);
    }
    return result.data;
  }

  private async transition(
    sessionId: string,
    result: CommandResult<SessionTransitionResult>,
  ): Promise<CheckoutSessionView> {
    const data = this.unwrap(result);
    await this.readModel.invalidateCache(sessionId);
    return data.session;
  }
}
