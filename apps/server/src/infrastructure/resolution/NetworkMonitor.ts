/**
 * Synchronous reachability check over the host's network interfaces
 */

import { networkInterfaces } from 'os';
import type { INetworkMonitor } from '../../domain/resolution';

export type InterfaceReader = typeof networkInterfaces;

export class NetworkMonitor implements INetworkMonitor {
  constructor(private readonly readInterfaces: InterfaceReader = networkInterfaces) {}

  /**
   * Online when any non-loopback interface has an address
   */
  isOnline(): boolean {
    const interfaces = this.readInterfaces();
    return Object.values(interfaces).some(addresses =>
      (addresses ?? []).some(address => !address.internal)
    );
  }
}
