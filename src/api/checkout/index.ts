export * from './checkout.controller';
export * from './checkout.module';
export * from './command-error.mapper';
export * from './dto/checkout.dto';
