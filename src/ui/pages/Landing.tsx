/**
 * Landing page - links to the scrape endpoint and lists known devices.
 */
import type { FC } from "hono/jsx";

import type { DeviceView } from "../../api/views.js";
import { BaseLayout } from "../layouts/Base.js";

type LandingPageProps = {
  appName: string;
  version: string;
  devices: ReadonlyArray<DeviceView>;
};

const formatWatts = (device: DeviceView): string =>
  device.lastReading ? `${device.lastReading.powerWatts.toFixed(1)} W` : "-";

export const LandingPage: FC<LandingPageProps> = ({ appName, version, devices }) => (
  <BaseLayout title={appName}>
    <hgroup>
      <h1>{appName}</h1>
      <p>Version {version}</p>
    </hgroup>

    <p>
      Prometheus metrics: <a href="/metrics">/metrics</a>
      {" · "}
      Device inventory: <a href="/api/devices">/api/devices</a>
    </p>

    <section>
      <h2>Devices</h2>
      {devices.length === 0 ? (
        <p>No devices known yet.</p>
      ) : (
        <table>
          <thead>
            <tr>
              <th>Alias</th>
              <th>Device ID</th>
              <th>Address</th>
              <th>State</th>
              <th>Power</th>
            </tr>
          </thead>
          <tbody>
            {devices.map((device) => (
              <tr>
                <td>{device.alias}</td>
                <td>
                  <code>{device.deviceId}</code>
                </td>
                <td>{device.address}</td>
                <td>{device.health}</td>
                <td>{formatWatts(device)}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </section>
  </BaseLayout>
);
