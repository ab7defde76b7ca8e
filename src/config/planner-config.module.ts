import { Global, Module } from '@nestjs/common'
import { loadPlannerConfig, PLANNER_CONFIG } from './planner-config'

@Global()
@Module({
  providers: [{ provide: PLANNER_CONFIG, useFactory: () => loadPlannerConfig() }],
  exports: [PLANNER_CONFIG],
})
export class PlannerConfigModule {}
