import { Migration } from '@mikro-orm/migrations'

export class Migration20261018093512 extends Migration {
  override async up(): Promise<void> {
    this.addSql(`create table "dynamic_entity_definitions" ("id" uuid not null default gen_random_uuid(), "name" text not null, "name_key" text not null, "scope_key" text not null, "tenant_id" text null, "table_name" text not null, "label" text null, "description" text null, "fields_json" jsonb not null default '[]', "version" int not null default 1, "created_at" timestamptz not null, "updated_at" timestamptz not null, constraint "dynamic_entity_definitions_pkey" primary key ("id"));`)
    this.addSql(`alter table "dynamic_entity_definitions" add constraint "dynamic_entity_definitions_name_scope_unique" unique ("name_key", "scope_key");`)
    this.addSql(`alter table "dynamic_entity_definitions" add constraint "dynamic_entity_definitions_table_name_unique" unique ("table_name");`)
    this.addSql(`create index "dynamic_entity_definitions_tenant_idx"" on "dynamic_entity_definitions" ("tenant_id");`)

    this.addSql(`create table "dynamic_schema_versions" ("id" uuid not null default gen_random_uuid(), "entity_name" text not null, "name_key" text not null, "scope_key" text not null, "tenant_id" text null, "table_name" text not null, "version" int not null default 0, "applied_descriptor" jsonb null, "applied_at" timestamptz null, "last_error" text null, "last_error_at" timestamptz null, "last_attempted_version" int null, "updated_at" timestamptz not null, constraint "dynamic_schema_versions_pkey" primary key ("id"));`)
    this.addSql(`alter table "dynamic_schema_versions" add constraint "dynamic_schema_versions_name_scope_unique" unique ("name_key", "scope_key");`)

    this.addSql(`create table "dynamic_schema_migrations" ("id" uuid not null default gen_random_uuid(), "entity_name" text not null, "name_key" text not null, "scope_key" text not null, "from_version" int not null, "to_version" int not null, "operations" jsonb not null, "status" text not null, "error" text null, "attempts" int not null default 1, "duration_ms" int not null default 0, "created_at" timestamptz not null, constraint "dynamic_schema_migrations_pkey" primary key ("id"));`)
    this.addSql(`create index "dynamic_schema_migrations_entity_idx" on "dynamic_schema_migrations" ("name_key", "scope_key", "created_at");`)
  }

  override async down(): Promise<void> {
    this.addSql(`drop table if exists "dynamic_schema_migrations" cascade;`)
    this.addSql(`drop table if exists "dynamic_schema_versions" cascade;`)
    this.addSql(`drop table if exists "dynamic_entity_definitions" cascade;`)
  }
}
