/**
 * Commands Module
 *
 * Provides the command bus. Handlers are provided by the feature modules
 * and found through DiscoveryService: every provider class carrying
 * @CommandHandler metadata is registered for its command type when this
 * module initializes.
 */

import { Module, OnModuleInit, Type } from '@nestjs/common';
import { DiscoveryModule, DiscoveryService } from '@nestjs/core';
import {
  CommandBus,
  CommandHandlerRegistry,
  COMMAND_HANDLER_METADATA,
} from './bus/command-bus';
import { ICommandHandler, ICommand } from '../shared/types/command.types';

@Module({
  imports: [DiscoveryModule],
  providers: [CommandBus, CommandHandlerRegistry],
  exports: [CommandBus, CommandHandlerRegistry],
})
export class CommandsModule implements OnModuleInit {
  constructor(
    private readonly discoveryService: DiscoveryService,
    private readonly registry: CommandHandlerRegistry,
  ) {}

  onModuleInit() {
    for (const wrapper of this.discoveryService.getProviders()) {
      const { metatype } = wrapper;
      if (!metatype) {
        continue;
      }

      const commandType: unknown = Reflect.getMetadata(COMMAND_HANDLER_METADATA, metatype);
      if (typeof commandType === 'string') {
        this.registry.register(
          commandType,
          metatype as Type<ICommandHandler<ICommand, unknown>>,
        );
      }
    }
  }
}
