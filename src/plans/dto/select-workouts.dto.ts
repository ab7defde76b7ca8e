import { IsArray, IsBoolean, IsIn, IsOptional, IsString } from 'class-validator'
import { EXPORT_FORMATS } from '../plans.service'
import type { ExportFormat } from '../plans.service'

export class SelectWorkoutsDto {
  @IsArray()
  @IsString({ each: true })
  @IsOptional()
  ids?: string[]

  @IsString()
  @IsOptional()
  nameFilter?: string
}

export class ExportPlanDto extends SelectWorkoutsDto {
  @IsIn(EXPORT_FORMATS)
  @IsOptional()
  format?: ExportFormat

  @IsBoolean()
  @IsOptional()
  clean?: boolean

  @IsString()
  @IsOptional()
  namePrefix?: string
}
