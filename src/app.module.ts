import { Module } from '@nestjs/common';
import { AppService } from './app.service';
import { AppConfigModule } from './config/config.module';
import { OptionsService } from './options/options.service';
import { VolatilityService } from './volatility/volatility.service';
import { StrategiesService } from './strategies/strategies.service';
import { BacktestingService } from './backtesting/backtesting.service';

@Module({
  imports: [AppConfigModule],
  providers: [
    AppService,
    OptionsService,
    VolatilityService,
    StrategiesService,
    BacktestingService,
  ],
})
export class AppModule {}
