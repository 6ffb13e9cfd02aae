import { Body, Controller, Delete, Get, HttpCode, HttpStatus, NotFoundException, Param, Post } from '@nestjs/common';
import { ApiBody, ApiExtraModels, ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';
import type { CodeContextMetadata } from '@core/domain/entities/review-request.entity';
import { CodeReviewService, ReviewBatchOptions } from '@core/services/code-review.service';
import { GetReviewUseCase } from '@core/usecases/get-review.usecase';
import { ReviewPullRequestUseCase } from '@core/usecases/review-pull-request.usecase';
import {
  ChangedFileDto,
  ReviewBatchDto,
  ReviewChangesDto,
  ReviewFilesDto,
  ReviewOptionsDto,
  ReviewPullRequestDto,
} from '../dtos/review-request.dto';
import {
  PullRequestReviewView,
  RecordView,
  ResultView,
  toPullRequestReviewView,
  toRecordView,
  toResultView,
} from '../serializers/review.serializer';

function toBatchOptions(dto: ReviewOptionsDto, context?: CodeContextMetadata): ReviewBatchOptions {
  return {
    reviewType: dto.reviewType,
    settings: dto.settings,
    maxConcurrent: dto.maxConcurrent,
    store: dto.store,
    temperature: dto.temperature,
    context,
  };
}

function contextOf(dto: ReviewBatchDto): CodeContextMetadata {
  return { repository: dto.repository, commitHash: dto.commitHash, author: dto.author };
}

@ApiTags('reviews')
@ApiExtraModels(ChangedFileDto)
@Controller('reviews')
export class ReviewController {
  constructor(
    private readonly codeReviewService: CodeReviewService,
    private readonly getReviewUseCase: GetReviewUseCase,
    private readonly reviewPullRequestUseCase: ReviewPullRequestUseCase,
  ) {}

  @Post('files')
  @ApiOperation({ summary: 'Review a set of files', description: 'Runs one review per file under the concurrency cap' })
  @ApiBody({ type: ReviewFilesDto })
  @ApiResponse({ status: 201, description: 'Aggregated result, including per-file errors.' })
  @ApiResponse({ status: 400, description: 'Invalid input data.' })
  async reviewFiles(@Body() dto: ReviewFilesDto): Promise<ResultView> {
    const result = await this.codeReviewService.reviewFiles(dto.files, toBatchOptions(dto, contextOf(dto)));
    return toResultView(result);
  }

  @Post('changes')
  @ApiOperation({ summary: 'Review changed files with their diffs' })
  @ApiBody({ type: ReviewChangesDto })
  @ApiResponse({ status: 201, description: 'Aggregated result, including per-file errors.' })
  async reviewChanges(@Body() dto: ReviewChangesDto): Promise<ResultView> {
    const files = new Map(
      Object.entries(dto.files).map(([path, file]) => [path, { content: file.content, diff: file.diff ?? undefined }]),
    );
    const result = await this.codeReviewService.reviewChanges(files, dto.baseBranch, toBatchOptions(dto, contextOf(dto)));
    return toResultView(result);
  }

  @Post('pull-request')
  @ApiOperation({
    summary: 'Review a GitHub pull request',
    description: 'Fetches the changed files, reviews them and submits the feedback as a pull request review',
  })
  @ApiBody({ type: ReviewPullRequestDto })
  @ApiResponse({ status: 201, description: 'Submitted comments, disposition and the aggregated result.' })
  @ApiResponse({ status: 502, description: 'GitHub or the AI provider failed.' })
  async reviewPullRequest(@Body() dto: ReviewPullRequestDto): Promise<PullRequestReviewView> {
    const review = await this.reviewPullRequestUseCase.execute(dto.repository, dto.pullNumber, {
      ...toBatchOptions(dto),
      baseBranch: dto.baseBranch,
    });
    return toPullRequestReviewView(review);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a stored review' })
  @ApiParam({ name: 'id', description: 'Review id returned when the review was stored' })
  @ApiResponse({ status: 404, description: 'No review with this id.' })
  async getReview(@Param('id') id: string): Promise<RecordView> {
    const record = await this.getReviewUseCase.execute(id);
    if (!record) {
      throw new NotFoundException(`Review ${id} not found`);
    }
    return toRecordView(record);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Delete a stored review' })
  @ApiResponse({ status: 204, description: 'The review was deleted.' })
  @ApiResponse({ status: 404, description: 'No review with this id.' })
  async deleteReview(@Param('id') id: string): Promise<void> {
    const deleted = await this.codeReviewService.deleteReview(id);
    if (!deleted) {
      throw new NotFoundException(`Review ${id} not found`);
    }
  }
}
