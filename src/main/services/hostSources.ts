// Host Sources - turn CLI input into crawl targets
import * as fs from 'fs';
import { DOMParser } from '@xmldom/xmldom';
import type { InputMode, Target } from '../../shared/types';
import { ConfigError } from '../config';

const HOST_TOKEN_PATTERN = /^(?<host>[\p{L}\p{N}_.-]+)(?::(?<port>\d+))?$/u;

export const parseHostToken = (token: string, defaultPort: number): Target | null => {
  const match = HOST_TOKEN_PATTERN.exec(token.trim());
  if (!match?.groups) return null;

  const port = match.groups.port === undefined ? defaultPort : Number.parseInt(match.groups.port, 10);
  if (port < 1 || port > 65535) return null;
  return { address: match.groups.host, port };
};

// One host[:port] per line; blank and malformed lines are skipped
export const parseHostList = (content: string, defaultPort: number): Target[] => {
  const targets: Target[] = [];
  for (const line of content.split(/\r?\n/)) {
    if (line.trim() === '') continue;
    const target = parseHostToken(line, defaultPort);
    if (target) targets.push(target);
  }
  return targets;
};

export const readHostFile = async (filePath: string, defaultPort: number): Promise<Target[]> => {
  const content = await fs.promises.readFile(filePath, 'utf8');
  return parseHostList(content, defaultPort);
};

const firstChild = (parent: Element, tagName: string): Element | null => parent.getElementsByTagName(tagName).item(0);

/**
 * Open FTP ports from an nmap XML report (nmap -oX)
 */
export const parseNmapReport = (xml: string): Target[] => {
  const document = new DOMParser().parseFromString(xml, 'text/xml');
  const hosts = document.getElementsByTagName('host');
  const targets: Target[] = [];

  for (let i = 0; i < hosts.length; i++) {
    const host = hosts.item(i);
    const address = host ? firstChild(host, 'address')?.getAttribute('addr') : null;
    if (!host || !address) continue;

    const ports = host.getElementsByTagName('port');
    for (let j = 0; j < ports.length; j++) {
      const port = ports.item(j);
      if (!port) continue;
      const state = firstChild(port, 'state')?.getAttribute('state');
      const service = firstChild(port, 'service')?.getAttribute('name');
      const portId = Number.parseInt(port.getAttribute('portid') ?? '', 10);
      if (state === 'open' && service === 'ftp' && Number.isInteger(portId)) {
        targets.push({ address, port: portId });
      }
    }
  }

  return targets;
};

export const readNmapReport = async (filePath: string): Promise<Target[]> => {
  const xml = await fs.promises.readFile(filePath, 'utf8');
  return parseNmapReport(xml);
};

export const loadTargets = async (mode: InputMode, input: string, defaultPort: number): Promise<Target[]> => {
  switch (mode) {
    case 'file':
      return readHostFile(input, defaultPort);
    case 'nmap':
      return readNmapReport(input);
    case 'host': {
      const target = parseHostToken(input, defaultPort);
      if (!target) {
        throw new ConfigError([`input: "${input}" is not a valid host[:port]`]);
      }
      return [target];
    }
  }
};
