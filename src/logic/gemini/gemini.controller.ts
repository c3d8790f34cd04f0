import { Controller, Get } from '@nestjs/common';
import { GeminiService } from './gemini.service';

@Controller('gemini')
export class GeminiController {
    constructor(private readonly geminiService: GeminiService) {}

    @Get('model')
    getModelInfo() {
        return this.geminiService.getModelInfo();
    }

    @Get('health')
    async health() {
        const connected = await this.geminiService.testConnection();
        return { connected, model: this.geminiService.getModelInfo().model };
    }
}
