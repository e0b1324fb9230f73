import { Body, Controller, Delete, Get, Param, ParseUUIDPipe, Post, Query, UploadedFiles, UseInterceptors } from '@nestjs/common';
import { FilesInterceptor } from '@nestjs/platform-express';
import { ChatService } from './chat.service';
import { AskDto, CreateConversationDto, MessagesQueryDto } from './dto/chat.dto';

const MAX_FILES = 10;

@Controller('chat')
export class ChatController {

    constructor(private readonly chatService: ChatService) {}

    @Post()
    @UseInterceptors(FilesInterceptor('files', MAX_FILES))
    async chat(@Body() body: AskDto, @UploadedFiles() files?: Express.Multer.File[]) {
        return this.chatService.ask(body, files ?? []);
    }

    @Post('conversations')
    async createConversation(@Body() body: CreateConversationDto) {
        return this.chatService.createConversation(body.name);
    }

    @Get('conversations')
    async getAllConversations() {
        return this.chatService.getAllConversations();
    }

    @Get('conversations/:id/messages')
    async getConversationMessages(@Param('id', ParseUUIDPipe) id: string, @Query() query: MessagesQueryDto) {
        return this.chatService.getConversationMessages(id, query.limit);
    }

    @Post('conversations/:id/clear')
    async clearConversation(@Param('id', ParseUUIDPipe) id: string) {
        return this.chatService.clearConversation(id);
    }

    @Delete('conversations/:id')
    async deleteConversation(@Param('id', ParseUUIDPipe) id: string) {
        return this.chatService.deleteConversation(id);
    }

    @Delete('conversations')
    async deleteAllConversations() {
        return this.chatService.deleteAllConversations();
    }
}
