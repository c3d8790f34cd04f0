import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Conversation } from './conversation.entity';
import { LONG_BLOB, LONG_TEXT } from './column-types';

export const MESSAGE_ROLES = ['user', 'assistant'] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

@Entity('messages')
@Index(['conversationId', 'createdAt', 'id'])
export class Message {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  conversationId!: number;

  @Column({ type: 'simple-enum', enum: MESSAGE_ROLES })
  role!: MessageRole;

  @Column({ type: LONG_TEXT })
  content!: string;

  @CreateDateColumn()
  createdAt!: Date;

  // Original upload, only on messages created from a document.
  @Column({ type: LONG_BLOB, nullable: true, select: false })
  attachment!: Buffer | null;

  @Column({ type: 'varchar', length: 255, nullable: true })
  attachmentName!: string | null;

  @ManyToOne(() => Conversation, conversation => conversation.messages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'conversationId' })
  conversation!: Conversation;
}
