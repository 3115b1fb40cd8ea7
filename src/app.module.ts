import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import portfolioConfig from './config/portfolio.config';
import { AppController } from './app.controller';
import { HoldingsModule } from './holdings/holdings.module';
import { RunModule } from './run/run.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [portfolioConfig] }),
    HoldingsModule,
    RunModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
