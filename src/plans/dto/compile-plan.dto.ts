import { IsBoolean, IsDefined, IsOptional, IsString } from 'class-validator'

export class CompilePlanDto {
  // YAML text or the decoded document
  @IsDefined()
  document!: string | Record<string, unknown>

  @IsString()
  @IsOptional()
  nameFilter?: string

  @IsBoolean()
  @IsOptional()
  treadmill?: boolean
}

export class ImportPlanDto extends CompilePlanDto {
  @IsBoolean()
  @IsOptional()
  replace?: boolean
}
