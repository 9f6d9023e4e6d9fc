/**
 * Test helper: reserve a free loopback port.
 *
 * Nodes advertise their port in the record they register, so it has to
 * be known before the node starts listening.
 */

import { createServer } from "node:net";

export function freePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = createServer();
    probe.once("error", reject);
    probe.listen(0, "127.0.0.1", () => {
      const address = probe.address();
      const port = typeof address === "object" && address !== null ? address.port : 0;
      probe.close((err) => (err ? reject(err) : resolve(port)));
    });
  });
}
