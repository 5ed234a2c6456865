import { Body, Controller, HttpCode, HttpStatus, Post, Res } from '@nestjs/common';
import { Response } from 'express';
import { Public } from '../decorators/public.decorator';
import { ChunkIntakeService } from '../intake/chunk-intake.service';
import { parseUploadNotification } from '../intake/upload-notification';

@Public()
@Controller('notifications')
export class NotificationsController {
  constructor(private readonly intake: ChunkIntakeService) {}

  /** Same handling as the chunk queue, for bridges that deliver over HTTP. */
  @Post('chunk-uploaded')
  @HttpCode(HttpStatus.OK)
  async chunkUploaded(@Body() body: unknown, @Res({ passthrough: true }) res: Response) {
    const outcome = await this.intake.handle(parseUploadNotification(body));
    if (outcome.outcome === 'dropped') {
      res.status(HttpStatus.ACCEPTED);
    }
    return outcome;
  }
}
