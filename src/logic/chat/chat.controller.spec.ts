import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { BadRequestException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { ChatController, ReplySink } from './chat.controller';
import { ChatService, ChatStreamEvent } from './chat.service';

class FakeReply extends EventEmitter implements ReplySink {
  writableFinished = false;
  json = jest.fn();
  setHeader = jest.fn();
  flushHeaders = jest.fn();
  write = jest.fn();
  end = jest.fn(() => {
    this.writableFinished = true;
    this.emit('close');
  });
}

describe('ChatController', () => {
  let controller: ChatController;
  const chatService = {
    startSession: jest.fn(() => '3f1c2a9e-0000-4000-8000-000000000001'),
    supportedFormats: jest.fn(() => ({ pdf: ['.pdf'] })),
    uploadDocument: jest.fn(),
    getHistory: jest.fn(),
    reply: jest.fn(),
    streamReply: jest.fn(),
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    const module: TestingModule = await Test.createTestingModule({
      controllers: [ChatController],
      providers: [{ provide: ChatService, useValue: chatService }],
    }).compile();

    controller = module.get<ChatController>(ChatController);
  });

  it('starts a session', () => {
    expect(controller.startSession()).toEqual({ sessionId: '3f1c2a9e-0000-4000-8000-000000000001' });
  });

  it('lists the supported formats', () => {
    expect(controller.supportedFormats()).toEqual({ pdf: ['.pdf'] });
  });

  it('requires a file on upload', async () => {
    await expect(controller.uploadDocument({ sessionId: 's1' }, undefined)).rejects.toBeInstanceOf(BadRequestException);
    expect(chatService.uploadDocument).not.toHaveBeenCalled();
  });

  it('passes the multipart file on to the service', async () => {
    chatService.uploadDocument.mockResolvedValue({ ok: true });
    const buffer = Buffer.from('Taxi 23.00');

    await controller.uploadDocument({ sessionId: 's1' }, {
      fieldname: 'file',
      originalname: 'taxi.txt',
      encoding: '7bit',
      mimetype: 'text/plain',
      size: buffer.length,
      buffer,
      destination: '',
      filename: '',
      path: '',
      stream: Readable.from(buffer),
    });

    expect(chatService.uploadDocument).toHaveBeenCalledWith('s1', {
      fileName: 'taxi.txt',
      size: 10,
      mimeType: 'text/plain',
      buffer,
    });
  });

  it('forwards the history limit', async () => {
    chatService.getHistory.mockResolvedValue([]);

    await controller.getHistory({ sessionId: 's1' }, { limit: 5 });

    expect(chatService.getHistory).toHaveBeenCalledWith('s1', 5);
  });

  describe('sendMessage', () => {
    it('answers with JSON when streaming is off', async () => {
      const message = { id: 2, role: 'assistant', content: 'Total is 18.40 EUR' };
      chatService.reply.mockResolvedValue(message);
      const res = new FakeReply();

      await controller.sendMessage({ sessionId: 's1' }, { content: 'Total?', stream: false }, res);

      expect(chatService.reply).toHaveBeenCalledWith('s1', 'Total?');
      expect(res.json).toHaveBeenCalledWith(message);
      expect(res.write).not.toHaveBeenCalled();
    });

    it('writes one JSON line per event and then ends', async () => {
      chatService.streamReply.mockImplementation(async function* (): AsyncGenerator<ChatStreamEvent> {
        yield { type: 'token', text: 'Hi' };
        yield { type: 'error', code: 'RateLimited', message: 'Too many requests' };
      });
      const res = new FakeReply();

      await controller.sendMessage({ sessionId: 's1' }, { content: 'Total?', stream: true }, res);

      expect(res.setHeader).toHaveBeenCalledWith('Content-Type', 'application/x-ndjson; charset=utf-8');
      expect(res.flushHeaders).toHaveBeenCalledTimes(1);
      expect(res.write.mock.calls).toEqual([
        ['{"type":"token","text":"Hi"}\n'],
        ['{"type":"error","code":"RateLimited","message":"Too many requests"}\n'],
      ]);
      expect(res.end).toHaveBeenCalledTimes(1);
      expect(chatService.streamReply.mock.calls[0][2].aborted).toBe(false);
    });

    it('cancels the reply and stops writing when the client disconnects', async () => {
      const res = new FakeReply();
      let signal: AbortSignal | undefined;
      chatService.streamReply.mockImplementation(async function* (
        _sessionId: string,
        _content: string,
        cancel: AbortSignal,
      ): AsyncGenerator<ChatStreamEvent> {
        signal = cancel;
        yield { type: 'token', text: 'Hi' };
        res.emit('close');
        yield { type: 'token', text: ' there' };
      });

      await controller.sendMessage({ sessionId: 's1' }, { content: 'Total?', stream: true }, res);

      expect(signal?.aborted).toBe(true);
      expect(res.write.mock.calls).toEqual([['{"type":"token","text":"Hi"}\n']]);
    });
  });
});
