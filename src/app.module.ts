import { Module } from '@nestjs/common'
import { APP_FILTER } from '@nestjs/core'
import { AppController } from './app.controller'
import { ClockModule } from './clock/clock.module'
import { PlannerExceptionFilter } from './common/planner-exception.filter'
import { PlannerConfigModule } from './config/planner-config.module'
import { PlansModule } from './plans/plans.module'
import { ScheduleModule } from './schedule/schedule.module'

@Module({
  imports: [PlannerConfigModule, ClockModule, PlansModule, ScheduleModule],
  controllers: [AppController],
  providers: [{ provide: APP_FILTER, useClass: PlannerExceptionFilter }],
})
export class AppModule {}
