import { DuckDBConnection } from "@duckdb/node-api";

export async function createSchema(
  connection: DuckDBConnection
): Promise<void> {
  await connection.run(`create sequence if not exists devices_id_seq start 1`);
  await connection.run(`create sequence if not exists batteries_id_seq start 1`);
  await connection.run(`create sequence if not exists telemetry_id_seq start 1`);

  // one row per beacon, keyed by the scanner's peripheral id
  await connection.run(`create table if not exists devices (
    id integer primary key default nextval('devices_id_seq'),
    external_id text not null unique,
    mac_address text,
    name text,
    first_seen timestamp not null
  )`);

  // last-known values; 0 means never observed
  await connection.run(`create table if not exists batteries (
    id integer primary key default nextval('batteries_id_seq'),
    device_id integer not null,
    label text,
    resistance double not null default 0,
    capacity double not null default 0,
    discharge_current double not null default 0
  )`);

  // append-only history
  await connection.run(`create table if not exists telemetry (
    id integer primary key default nextval('telemetry_id_seq'),
    voltage double not null,
    resistance double not null,
    capacity double not null,
    adv_count bigint not null,
    uptime_seconds double not null,
    mode integer not null,
    discharge_current double not null,
    battery_id integer not null,
    recorded_at timestamp not null
  )`);

  await connection.run(
    `create index if not exists idx_batteries_device on batteries(device_id)`
  );
  await connection.run(
    `create index if not exists idx_telemetry_battery_ts on telemetry(battery_id, recorded_at)`
  );
}
