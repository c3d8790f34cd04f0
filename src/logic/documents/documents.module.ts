import { Module } from '@nestjs/common';
import { DocumentExtractorService } from './document-extractor.service';
import { PDF_TEXT_STRATEGIES, defaultPdfStrategies } from './pdf-strategies';

@Module({
    providers: [
        DocumentExtractorService,
        { provide: PDF_TEXT_STRATEGIES, useFactory: defaultPdfStrategies },
    ],
    exports: [DocumentExtractorService],
})
export class DocumentsModule {}
