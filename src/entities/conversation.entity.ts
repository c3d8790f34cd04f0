import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, OneToMany } from 'typeorm';
import { Message } from './message.entity';

export type ConversationMetadata = Record<string, unknown>;

@Entity('conversations')
export class Conversation {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 255, unique: true })
  sessionId!: string;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;

  @Column('simple-json', { nullable: true })
  metadata!: ConversationMetadata | null;

  @OneToMany(() => Message, message => message.conversation)
  messages!: Message[];
}
