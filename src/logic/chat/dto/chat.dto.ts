import { Type } from 'class-transformer';
import { IsBoolean, IsInt, IsNotEmpty, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';

export class SessionParamsDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(255)
    sessionId!: string;
}

export class SendMessageDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(32000)
    content!: string;

    @IsOptional()
    @IsBoolean()
    stream?: boolean;
}

export class HistoryQueryDto {
    @IsOptional()
    @Type(() => Number)
    @IsInt()
    @Min(1)
    @Max(500)
    limit?: number;
}
