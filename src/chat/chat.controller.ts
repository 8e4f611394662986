import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
} from '@nestjs/common';
import { ChatService } from './chat.service';
import { SendMessageDto } from './dtos/send-message.dto';

@Controller('chat/sessions')
export class ChatController {
  constructor(private readonly chat: ChatService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  open() {
    return this.chat.open();
  }

  @Post(':sessionId/messages')
  @HttpCode(HttpStatus.OK)
  send(@Param('sessionId') sessionId: string, @Body() dto: SendMessageDto) {
    return this.chat.send(sessionId, dto.text);
  }

  @Get(':sessionId')
  describe(@Param('sessionId') sessionId: string) {
    return this.chat.describe(sessionId);
  }

  @Delete(':sessionId')
  @HttpCode(HttpStatus.NO_CONTENT)
  close(@Param('sessionId') sessionId: string) {
    this.chat.close(sessionId);
  }
}
