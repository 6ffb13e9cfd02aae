import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsDate, IsEnum, IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import { ReviewType } from '@core/domain/entities/review-request.entity';

export class FileHistoryQueryDto {
  @ApiProperty({ description: 'Path of the reviewed file', example: 'src/app.ts' })
  @IsString()
  @IsNotEmpty()
  path!: string;

  @ApiPropertyOptional({ example: 10 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;

  @ApiPropertyOptional({ enum: ReviewType })
  @IsOptional()
  @IsEnum(ReviewType)
  reviewType?: ReviewType;
}

export class TimeframeQueryDto {
  @ApiProperty({ type: String, format: 'date-time', example: '2024-05-01T00:00:00Z' })
  @Type(() => Date)
  @IsDate()
  start!: Date;

  @ApiProperty({ type: String, format: 'date-time', example: '2024-05-31T23:59:59Z' })
  @Type(() => Date)
  @IsDate()
  end!: Date;

  @ApiPropertyOptional({ enum: ReviewType })
  @IsOptional()
  @IsEnum(ReviewType)
  reviewType?: ReviewType;
}

export class CleanupQueryDto {
  @ApiProperty({ type: String, format: 'date-time', description: 'Delete reviews strictly older than this instant' })
  @Type(() => Date)
  @IsDate()
  olderThan!: Date;
}

export class HistoryReportQueryDto {
  @ApiPropertyOptional({ description: 'Limit the report to one file' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  path?: string;

  @ApiPropertyOptional({ enum: ReviewType })
  @IsOptional()
  @IsEnum(ReviewType)
  reviewType?: ReviewType;

  @ApiPropertyOptional({ example: 50 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  limit?: number;
}
