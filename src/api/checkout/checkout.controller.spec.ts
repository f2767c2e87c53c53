import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { BadRequestException, HttpException, NotFoundException } from '@nestjs/common';
import { CheckoutController, parseRequestedStep } from './checkout.controller';
import { CommandBus, DEFAULT_MAX_ATTEMPTS, TRANSIENT_FAILURES } from '../../commands/bus/command-bus';
import { CheckoutCommandTypes } from '../../commands/checkout.commands';
import { CheckoutSessionReadModel } from '../../read-models/checkout-session.read-model';
import { toSessionView } from '../../read-models/checkout-session.view';
import { AuditService } from '../../audit/audit.service';
import { ShippingCatalog } from '../../domain/services/shipping-catalog';
import { CheckoutSteps } from '../../domain/value-objects/checkout-step';
import { RequestContext } from '../../shared/context/request-context';
import {
  CommandErrorCodes,
  commandFailure,
  commandSuccess,
  createCommandError,
} from '../../shared/types/command.types';
import { CUSTOMER, sessionAt, shippingCatalog, testConfigService } from '../../testing/checkout.fixtures';

function inRequest<T>(callback: () => T): T {
  return RequestContext.run(
    RequestContext.createBackgroundContext({ correlationId: 'corr-http', actor: CUSTOMER }),
    callback,
  );
}

describe('CheckoutController', () => {
  let controller: CheckoutController;
  let execute: jest.Mock;
  let readModel: {
    getSessionView: jest.Mock;
    getActiveSessionView: jest.Mock;
    getSessionHistory: jest.Mock;
    invalidateCache: jest.Mock;
  };

  const deliveryView = toSessionView(sessionAt(CheckoutSteps.DELIVERY));

  beforeEach(async () => {
    execute = jest.fn();
    readModel = {
      getSessionView: jest.fn().mockResolvedValue(null),
      getActiveSessionView: jest.fn().mockResolvedValue(null),
      getSessionHistory: jest.fn().mockResolvedValue([]),
      invalidateCache: jest.fn().mockResolvedValue(undefined),
    };

    const moduleRef: TestingModule = await Test.createTestingModule({
      controllers: [CheckoutController],
      providers: [
        { provide: CommandBus, useValue: { execute } },
        { provide: CheckoutSessionReadModel, useValue: readModel },
        { provide: AuditService, useValue: { getEntityAuditTrail: jest.fn() } },
        { provide: ShippingCatalog, useValue: shippingCatalog },
        { provide: ConfigService, useValue: testConfigService() },
      ],
    }).compile();

    controller = moduleRef.get(CheckoutController);
  });

  describe('commands', () => {
    it('starts checkout with the request metadata and drops the cached view', async () => {
      execute.mockResolvedValue(commandSuccess({ session: deliveryView, created: true }));

      const result = await inRequest(() =>
        controller.startCheckout({
          cartId: 'cart-1',
          customerId: 'customer-1',
          lineItems: [{ productId: 'sku-mug', productName: 'Mug', unitPriceMinor: 1250, quantity: 4 }],
          subtotalMinor: 5000,
        }),
      );

      expect(result.created).toBe(true);
      const [command] = execute.mock.calls[0];
      expect(command.type).toBe(CheckoutCommandTypes.START);
      expect(command.payload).toEqual({
        cartId: 'cart-1',
        customerId: 'customer-1',
        currency: undefined,
        lineItems: [{ productId: 'sku-mug', productName: 'Mug', unitPriceMinor: 1250, quantity: 4 }],
        subtotalMinor: 5000,
      });
      expect(command.metadata.correlationId).toBe('corr-http');
      expect(command.metadata.actor).toEqual(CUSTOMER);
      expect(readModel.invalidateCache).toHaveBeenCalledWith(deliveryView.id);
    });

    it('maps a rejected step to 409 with the error code', async () => {
      execute.mockResolvedValue(
        commandFailure(
          createCommandError(
            CommandErrorCodes.INVALID_STEP_TRANSITION,
            "Cannot move checkout from 'started' to 'payment'",
          ),
        ),
      );

      const error: unknown = await inRequest(() =>
        controller.submitPayment('session-1', { providerId: 'mock' }),
      ).catch((thrown: unknown) => thrown);

      expect(error).toBeInstanceOf(HttpException);
      if (error instanceof HttpException) {
        expect(error.getStatus()).toBe(409);
        expect(error.getResponse()).toMatchObject({ code: 'INVALID_STEP_TRANSITION' });
      }
      expect(readModel.invalidateCache).not.toHaveBeenCalled();
    });

    it('confirms with one retry on transient failures', async () => {
      execute.mockResolvedValue(commandSuccess({ session: deliveryView, priceChanges: [] }));

      await inRequest(() => controller.confirmCheckout('session-1'));

      expect(execute).toHaveBeenCalledWith(expect.objectContaining({ type: CheckoutCommandTypes.CONFIRM }), {
        retryOn: TRANSIENT_FAILURES,
        maxAttempts: DEFAULT_MAX_ATTEMPTS,
      });
      expect(readModel.invalidateCache).toHaveBeenCalledWith('session-1');
    });
  });

  describe('queries', () => {
    it('404s an unknown session', async () => {
      await expect(controller.getSession('missing')).rejects.toBeInstanceOf(NotFoundException);
    });

    it('requires the customer header for the active session', async () => {
      await expect(controller.getActiveSession(undefined)).rejects.toBeInstanceOf(
        BadRequestException,
      );
      await expect(controller.getActiveSession('  ')).rejects.toBeInstanceOf(BadRequestException);
    });

    it('returns the active session of the customer', async () => {
      readModel.getActiveSessionView.mockResolvedValue(deliveryView);

      await expect(controller.getActiveSession('customer-1')).resolves.toBe(deliveryView);
      expect(readModel.getActiveSessionView).toHaveBeenCalledWith('customer-1', expect.any(String));
    });

    it('redirects a step ahead of the session back to its current step', async () => {
      readModel.getSessionView.mockResolvedValue(deliveryView);

      await expect(
        controller.checkStepAccess(deliveryView.id, { step: '/checkout/review' }),
      ).resolves.toEqual({ decision: 'redirect', redirectTo: '/checkout/delivery' });
    });

    it('allows steps the session has reached', async () => {
      readModel.getSessionView.mockResolvedValue(deliveryView);

      await expect(
        controller.checkStepAccess(deliveryView.id, { step: 'buyer_info' }),
      ).resolves.toEqual({ decision: 'allow' });
    });

    it('sends an unknown session to the cart', async () => {
      await expect(controller.checkStepAccess('missing', { step: 'delivery' })).resolves.toEqual({
        decision: 'redirect',
        redirectTo: '/cart',
      });
    });

    it('rejects an unknown step', async () => {
      await expect(
        controller.checkStepAccess('session-1', { step: 'teleport' }),
      ).rejects.toBeInstanceOf(BadRequestException);
    });

    it('lists shipping options and payment providers', () => {
      expect(controller.listShippingOptions().map((option) => option.id)).toEqual([
        'standard',
        'express',
        'overnight',
        'free',
      ]);
      expect(controller.listPaymentProviders()).toEqual({ providers: ['mock', 'invoice'] });
    });
  });
});

describe('parseRequestedStep', () => {
  it.each([
    ['delivery', 'delivery'],
    [' review ', 'review'],
    ['/checkout/buyer-info', 'buyer_info'],
    ['/checkout/confirmation/', 'confirmed'],
    ['completed', undefined],
    ['/checkout/unknown', undefined],
  ])('%j -> %s', (value, expected) => {
    expect(parseRequestedStep(value)).toBe(expected);
  });
});
