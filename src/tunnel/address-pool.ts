/**
 * @file tunnel/address-pool.ts
 * @description Pool d'adresses IPv4 du tunnel (CIDR + passerelle)
 */

import { FleetError } from '../errors.js';
import { t } from '../i18n.js';

const OCTET_RE = /^(0|[1-9]\d{0,2})$/;

/**
 * Convertit une IPv4 en entier non signé, null si invalide
 */
export function ipToNumber(ip: string): number | null {
  const parts = ip.split('.');
  if (parts.length !== 4) return null;

  let value = 0;
  for (const part of parts) {
    if (!OCTET_RE.test(part)) return null;
    const octet = parseInt(part, 10);
    if (octet > 255) return null;
    value = value * 256 + octet;
  }
  return value;
}

export function numberToIp(value: number): string {
  return [
    (value >>> 24) & 255,
    (value >>> 16) & 255,
    (value >>> 8) & 255,
    value & 255,
  ].join('.');
}

/**
 * Retire un éventuel suffixe CIDR ("10.10.0.2/32" -> "10.10.0.2")
 */
export function stripCidr(address: string): string {
  return address.split('/')[0].trim();
}

/**
 * Pool d'adresses du tunnel
 *
 * Le pool ne mémorise pas les adresses utilisées : l'appelant les dérive du
 * fichier de configuration WireGuard à chaque allocation.
 */
export class AddressPool {
  private readonly networkNum: number;
  private readonly broadcastNum: number;
  private readonly gatewayNum: number;
  readonly prefix: number;

  constructor(network: string, gateway: string) {
    const [networkAddr, prefixStr, ...rest] = network.trim().split('/');
    const prefix = Number(prefixStr);
    const base = ipToNumber(networkAddr);

    if (rest.length > 0 || base === null || !Number.isInteger(prefix) || prefix < 8 || prefix > 30) {
      throw new FleetError('INVALID_POOL', t('pool.invalidNetwork', { network }));
    }

    const hostBits = 32 - prefix;
    const size = 2 ** hostBits;
    this.prefix = prefix;
    this.networkNum = base - (base % size);
    this.broadcastNum = this.networkNum + size - 1;

    const gw = ipToNumber(gateway.trim());
    if (gw === null || gw <= this.networkNum || gw >= this.broadcastNum) {
      throw new FleetError('INVALID_POOL', t('pool.invalidGateway', { gateway, network }));
    }
    this.gatewayNum = gw;
  }

  get network(): string {
    return `${numberToIp(this.networkNum)}/${this.prefix}`;
  }

  get gateway(): string {
    return numberToIp(this.gatewayNum);
  }

  /**
   * Nombre d'adresses attribuables (hors réseau, broadcast et passerelle)
   */
  get size(): number {
    return this.broadcastNum - this.networkNum - 2;
  }

  /**
   * Vrai si l'adresse appartient au réseau (bornes comprises)
   */
  contains(address: string): boolean {
    const value = ipToNumber(stripCidr(address));
    return value !== null && value >= this.networkNum && value <= this.broadcastNum;
  }

  /**
   * Adresse attribuable à un peer : dans le réseau, ni réseau, ni broadcast, ni passerelle
   */
  validate(address: string): boolean {
    const value = ipToNumber(address);
    if (value === null) return false;
    return this.isAllocatable(value);
  }

  /**
   * Première adresse libre, dans l'ordre numérique croissant
   * @param used adresses déjà attribuées (suffixe /32 toléré)
   */
  allocate(used: Iterable<string>): string {
    const taken = new Set<number>();
    for (const address of used) {
      const value = ipToNumber(stripCidr(address));
      if (value !== null) taken.add(value);
    }

    for (let candidate = this.networkNum + 1; candidate < this.broadcastNum; candidate++) {
      if (candidate === this.gatewayNum || taken.has(candidate)) continue;
      return numberToIp(candidate);
    }

    throw new FleetError('EXHAUSTED', t('pool.exhausted', { network: this.network }));
  }

  /**
   * Itère sur toutes les adresses attribuables
   */
  *hosts(): IterableIterator<string> {
    for (let candidate = this.networkNum + 1; candidate < this.broadcastNum; candidate++) {
      if (candidate !== this.gatewayNum) yield numberToIp(candidate);
    }
  }

  private isAllocatable(value: number): boolean {
    return value > this.networkNum && value < this.broadcastNum && value !== this.gatewayNum;
  }
}
