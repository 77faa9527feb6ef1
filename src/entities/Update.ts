import { Entity, PrimaryGeneratedColumn, Column, Index, ManyToOne, JoinColumn } from "typeorm";
import { Site } from "./Site";

@Entity('updates')
@Index(['siteId', 'id'])
export class Update {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column({ name: 'site_id', type: 'integer' })
    siteId!: number;

    @ManyToOne(() => Site, (site) => site.updates, { onDelete: 'CASCADE' })
    @JoinColumn({ name: 'site_id' })
    site?: Site;

    @Column({ type: Date })
    timestamp!: Date;

    @Column({ name: 'content_hash', type: 'varchar', length: 64 })
    contentHash!: string;

    @Column({ type: 'text' })
    content!: string;
}
