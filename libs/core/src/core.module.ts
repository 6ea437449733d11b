import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { envSchemaWithRefinements } from './env.schema';
import { PairRegistryService } from './pair-registry.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate:
        process.env.NODE_ENV === 'test'
          ? undefined
          : (config) => envSchemaWithRefinements.parse(config),
    }),
  ],
  providers: [PairRegistryService],
  exports: [ConfigModule, PairRegistryService],
})
export class CoreModule {}
