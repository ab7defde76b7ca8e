import { IsArray, IsOptional } from 'class-validator'
import type { WorkbookRow } from '../../plan-document/workbook'

/** Spreadsheet sheets, each an array of rows keyed by header. */
export class ConvertWorkbookDto {
  @IsArray()
  @IsOptional()
  config?: WorkbookRow[]

  @IsArray()
  @IsOptional()
  paces?: WorkbookRow[]

  @IsArray()
  @IsOptional()
  heartRates?: WorkbookRow[]

  @IsArray()
  workouts!: WorkbookRow[]
}
