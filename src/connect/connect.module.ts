import { Module } from '@nestjs/common'
import { PLANNER_CONFIG } from '../config/planner-config'
import type { PlannerConfig } from '../config/planner-config'
import { WORKOUT_CONNECT } from './connect.types'
import { HttpWorkoutConnect } from './http-workout-connect'

@Module({
  providers: [
    {
      provide: WORKOUT_CONNECT,
      useFactory: (config: PlannerConfig) => new HttpWorkoutConnect(config.workoutService),
      inject: [PLANNER_CONFIG],
    },
  ],
  exports: [WORKOUT_CONNECT],
})
export class ConnectModule {}
