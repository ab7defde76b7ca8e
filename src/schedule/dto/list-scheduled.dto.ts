import { IsIn, IsOptional, IsString, Matches } from 'class-validator'
import { SCHEDULE_RANGES } from '../schedule-range'
import type { ScheduleRange } from '../schedule-range'
import { ISO_DATE } from './schedule-plan.dto'

export class ListScheduledDto {
  @Matches(ISO_DATE, { message: 'from must be YYYY-MM-DD' })
  @IsOptional()
  from?: string

  @Matches(ISO_DATE, { message: 'to must be YYYY-MM-DD' })
  @IsOptional()
  to?: string

  @IsIn(SCHEDULE_RANGES)
  @IsOptional()
  range?: ScheduleRange

  @IsString()
  @IsOptional()
  nameFilter?: string
}
