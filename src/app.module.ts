import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DispatchModule } from './modules';
import { dispatchConfigFromEnv } from './config/env.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
    }),
    DispatchModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService) =>
        dispatchConfigFromEnv((key) => config.get<string>(key)),
    }),
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
