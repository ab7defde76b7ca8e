import { IsArray, IsIn, IsNotEmpty, IsOptional, IsString, Matches } from 'class-validator'
import type { ScheduleDirection } from '../scheduler'

export const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/

export class SchedulePlanDto {
  @IsString()
  @IsNotEmpty()
  planPrefix!: string

  @Matches(ISO_DATE, { message: 'raceDay must be YYYY-MM-DD' })
  raceDay!: string

  // mon..sun or 0..6, checked by the service
  @IsArray()
  @IsOptional()
  workoutDays?: (string | number)[]

  @IsIn(['forward', 'backward'])
  @IsOptional()
  direction?: ScheduleDirection

  @Matches(ISO_DATE, { message: 'today must be YYYY-MM-DD' })
  @IsOptional()
  today?: string
}

export class UnschedulePlanDto {
  @IsString()
  @IsNotEmpty()
  planPrefix!: string

  @Matches(ISO_DATE, { message: 'from must be YYYY-MM-DD' })
  @IsOptional()
  from?: string
}
