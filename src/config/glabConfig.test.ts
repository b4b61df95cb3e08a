import fs from 'fs';
import os from 'os';
import path from 'path';
import { defaultGlabConfigPaths, loadGlabCredentials, parseGlabConfig } from './glabConfig';

describe('parseGlabConfig', () => {
  it('takes the first host with a token', () => {
    const text = [
      'host: gitlab.com',
      'hosts:',
      '  gitlab.com:',
      '    token: ""',
      '  git.example.com:',
      '    token: test-token',
      '    api_protocol: http',
      '    api_host: api.git.example.com',
    ].join('\n');

    expect(parseGlabConfig(text)).toEqual({ url: 'http://api.git.example.com', token: 'test-token' });
  });

  it('falls back to the default host URL without a token', () => {
    const text = ['host: git.example.com', 'hosts:', '  git.example.com:', '    git_protocol: ssh'].join('\n');

    expect(parseGlabConfig(text)).toEqual({ url: 'https://git.example.com' });
  });

  it('returns null when nothing usable is configured', () => {
    expect(parseGlabConfig('editor: vim')).toBeNull();
    expect(parseGlabConfig('')).toBeNull();
  });
});

describe('loadGlabCredentials', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'glab-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('skips missing files and reads the next one', () => {
    const present = path.join(dir, 'config.yml');
    fs.writeFileSync(present, 'hosts:\n  gitlab.com:\n    token: test-token\n');

    expect(loadGlabCredentials([path.join(dir, 'missing.yml'), present])).toEqual({
      url: 'https://gitlab.com',
      token: 'test-token',
    });
  });

  it('reports malformed files and keeps going', () => {
    const broken = path.join(dir, 'broken.yml');
    fs.writeFileSync(broken, 'hosts: [unclosed');
    const onSkip = jest.fn();

    expect(loadGlabCredentials([broken], onSkip)).toBeNull();
    expect(onSkip).toHaveBeenCalledTimes(1);
    expect(String(onSkip.mock.calls[0][0]).startsWith(`Skipping glab config ${broken}: `)).toBe(true);
  });

  it('looks in the XDG location first', () => {
    expect(defaultGlabConfigPaths('/home/dev')).toEqual([
      path.join('/home/dev', '.config', 'glab-cli', 'config.yml'),
      path.join('/home/dev', '.glab-cli', 'config.yml'),
    ]);
  });
});
