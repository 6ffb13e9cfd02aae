import { Controller, Delete, Get, Query } from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CodeReviewService } from '@core/services/code-review.service';
import { CleanupQueryDto, FileHistoryQueryDto, TimeframeQueryDto } from '../dtos/history-query.dto';
import { RecordView, toRecordView } from '../serializers/review.serializer';

@ApiTags('history')
@Controller('history')
export class HistoryController {
  constructor(private readonly codeReviewService: CodeReviewService) {}

  @Get('files')
  @ApiOperation({ summary: 'Stored reviews of one file, most recent first' })
  @ApiResponse({ status: 503, description: 'Review storage is unavailable.' })
  async getFileHistory(@Query() query: FileHistoryQueryDto): Promise<RecordView[]> {
    const records = await this.codeReviewService.getFileHistory(query.path, {
      limit: query.limit,
      reviewType: query.reviewType,
    });
    return records.map(toRecordView);
  }

  @Get('timeframe')
  @ApiOperation({ summary: 'Stored reviews between two instants (inclusive), most recent first' })
  async getTimeframe(@Query() query: TimeframeQueryDto): Promise<RecordView[]> {
    const records = await this.codeReviewService.getReviewsInTimeframe(query.start, query.end, query.reviewType);
    return records.map(toRecordView);
  }

  @Delete()
  @ApiOperation({ summary: 'Delete reviews older than the given instant' })
  async cleanup(@Query() query: CleanupQueryDto): Promise<{ removed: number }> {
    const removed = await this.codeReviewService.cleanupOldReviews(query.olderThan);
    return { removed };
  }
}
