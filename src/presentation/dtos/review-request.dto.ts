import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsEnum,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsObject,
  IsOptional,
  IsString,
  Matches,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { CommentSeverity } from '@core/domain/entities/ai-response.entity';
import { ReviewType } from '@core/domain/entities/review-request.entity';
import { IsChangedFileMap, IsFileContentMap } from './validators';

export class ReviewSettingsDto {
  @ApiPropertyOptional({ description: 'Keep at most this many comments per file', example: 20 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxComments?: number;

  @ApiPropertyOptional({ enum: CommentSeverity, description: 'Drop comments less severe than this' })
  @IsOptional()
  @IsIn(Object.values(CommentSeverity))
  minSeverity?: string;

  @ApiPropertyOptional({ type: [String], example: ['error handling'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  focusAreas?: string[];

  @ApiPropertyOptional({ type: [String], example: ['generated/**'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  ignorePatterns?: string[];

  @ApiPropertyOptional({ type: 'object', additionalProperties: true })
  @IsOptional()
  @IsObject()
  customRules?: Record<string, unknown>;
}

export class ReviewOptionsDto {
  @ApiPropertyOptional({ enum: ReviewType, default: ReviewType.FULL })
  @IsOptional()
  @IsEnum(ReviewType)
  reviewType?: ReviewType;

  @ApiPropertyOptional({ type: ReviewSettingsDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ReviewSettingsDto)
  settings?: ReviewSettingsDto;

  @ApiPropertyOptional({ description: 'Maximum concurrent provider calls', example: 3 })
  @IsOptional()
  @IsInt()
  @Min(1)
  maxConcurrent?: number;

  @ApiPropertyOptional({ description: 'Persist each review in the history store', default: true })
  @IsOptional()
  @IsBoolean()
  store?: boolean;

  @ApiPropertyOptional({ minimum: 0, maximum: 1 })
  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(1)
  temperature?: number;
}

export class ReviewBatchDto extends ReviewOptionsDto {
  @ApiPropertyOptional({ example: 'owner/repo' })
  @IsOptional()
  @IsString()
  repository?: string;

  @ApiPropertyOptional({ example: 'a1b2c3d' })
  @IsOptional()
  @IsString()
  commitHash?: string;

  @ApiPropertyOptional({ example: 'octocat' })
  @IsOptional()
  @IsString()
  author?: string;
}

export class ReviewFilesDto extends ReviewBatchDto {
  @ApiProperty({
    description: 'File path to file content',
    type: 'object',
    additionalProperties: { type: 'string' },
    example: { 'src/app.ts': 'export const answer = 42;\n' },
  })
  @IsFileContentMap()
  files!: Record<string, string>;
}

export class ChangedFileDto {
  @ApiProperty()
  content!: string;

  @ApiPropertyOptional({ description: 'Unified diff of the change' })
  diff?: string;
}

export class ReviewChangesDto extends ReviewBatchDto {
  @ApiProperty({
    description: 'File path to { content, diff? }',
    type: 'object',
    additionalProperties: { $ref: '#/components/schemas/ChangedFileDto' },
  })
  @IsChangedFileMap()
  files!: Record<string, ChangedFileDto>;

  @ApiPropertyOptional({ default: 'main' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  baseBranch?: string;
}

export class ReviewPullRequestDto extends ReviewOptionsDto {
  @ApiProperty({ description: 'GitHub repository as owner/repo', example: 'owner/repo' })
  @Matches(/^[^/\s]+\/[^/\s]+$/, { message: 'repository must be in the form owner/repo' })
  repository!: string;

  @ApiProperty({ example: 42 })
  @IsInt()
  @Min(1)
  pullNumber!: number;

  @ApiPropertyOptional({ default: 'main' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  baseBranch?: string;
}
