import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigError } from '../../config';
import { loadTargets, parseHostList, parseHostToken, parseNmapReport } from '../hostSources';

const NMAP_REPORT = `<?xml version="1.0" encoding="UTF-8"?>
<nmaprun scanner="nmap" args="nmap -p 21,2121,80 -oX scan.xml 192.0.2.0/24">
  <host>
    <status state="up"/>
    <address addr="192.0.2.10" addrtype="ipv4"/>
    <ports>
      <port protocol="tcp" portid="21"><state state="open"/><service name="ftp"/></port>
      <port protocol="tcp" portid="80"><state state="open"/><service name="http"/></port>
      <port protocol="tcp" portid="2121"><state state="open"/><service name="ftp"/></port>
    </ports>
  </host>
  <host>
    <status state="up"/>
    <address addr="192.0.2.11" addrtype="ipv4"/>
    <ports>
      <port protocol="tcp" portid="21"><state state="filtered"/><service name="ftp"/></port>
      <port protocol="tcp" portid="990"><state state="open"/></port>
    </ports>
  </host>
</nmaprun>`;

describe('parseHostToken', () => {
  it('fills in the default port', () => {
    expect(parseHostToken('ftp.example.org', 21)).toEqual({ address: 'ftp.example.org', port: 21 });
  });

  it('reads an explicit port', () => {
    expect(parseHostToken('192.0.2.10:2121', 21)).toEqual({ address: '192.0.2.10', port: 2121 });
  });

  it('trims surrounding whitespace', () => {
    expect(parseHostToken('  mirror-1.example.org  ', 21)).toEqual({ address: 'mirror-1.example.org', port: 21 });
  });

  it('rejects malformed tokens and out-of-range ports', () => {
    expect(parseHostToken('ftp://host', 21)).toBeNull();
    expect(parseHostToken('host:', 21)).toBeNull();
    expect(parseHostToken('host:70000', 21)).toBeNull();
    expect(parseHostToken('', 21)).toBeNull();
  });
});

describe('parseHostList', () => {
  it('skips blank and malformed lines', () => {
    const content = 'a.example\r\n\r\nb.example:2121\nnot a host\n   \n';
    expect(parseHostList(content, 21)).toEqual([
      { address: 'a.example', port: 21 },
      { address: 'b.example', port: 2121 },
    ]);
  });
});

describe('parseNmapReport', () => {
  it('keeps only open ftp ports', () => {
    expect(parseNmapReport(NMAP_REPORT)).toEqual([
      { address: '192.0.2.10', port: 21 },
      { address: '192.0.2.10', port: 2121 },
    ]);
  });
});

describe('loadTargets', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ftp-lister-hosts-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a host list file', async () => {
    const file = path.join(dir, 'hosts.txt');
    fs.writeFileSync(file, 'a.example\nb.example:990\n');

    await expect(loadTargets('file', file, 2121)).resolves.toEqual([
      { address: 'a.example', port: 2121 },
      { address: 'b.example', port: 990 },
    ]);
  });

  it('reads an nmap report', async () => {
    const file = path.join(dir, 'scan.xml');
    fs.writeFileSync(file, NMAP_REPORT);

    await expect(loadTargets('nmap', file, 21)).resolves.toHaveLength(2);
  });

  it('wraps a single host token', async () => {
    await expect(loadTargets('host', 'ftp.example.org:2121', 21)).resolves.toEqual([
      { address: 'ftp.example.org', port: 2121 },
    ]);
  });

  it('rejects a host token that does not parse', async () => {
    await expect(loadTargets('host', 'bad host', 21)).rejects.toBeInstanceOf(ConfigError);
  });
});
