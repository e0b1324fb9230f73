import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, OneToMany } from 'typeorm';
import { Message } from './message.entity';

@Entity('conversations')
export class Conversation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 120, nullable: true })
  title!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @OneToMany(() => Message, message => message.conversation)
  messages!: Message[];
}
