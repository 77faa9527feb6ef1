import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, OneToMany, Unique } from "typeorm";
import { SiteStatus, SiteStyle } from "../types";
import { Update } from "./Update";

@Entity('sites')
@Unique(['url'])
export class Site {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column()
    url!: string;

    @Column({ name: 'interval_secs', type: 'integer' })
    intervalSecs!: number;

    @Column({ type: 'varchar', length: 16 })
    style!: SiteStyle;

    @Column({ type: 'varchar', length: 16, default: 'pending' })
    status!: SiteStatus;

    @Column({ name: 'last_checked', type: Date, nullable: true })
    lastChecked!: Date | null;

    @Column({ name: 'last_updated', type: Date, nullable: true })
    lastUpdated!: Date | null;

    @OneToMany(() => Update, (update) => update.site)
    updates?: Update[];

    @CreateDateColumn({ name: 'created_at' })
    createdAt!: Date;
}
