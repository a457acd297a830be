import { describe, expect, it } from 'vitest';
import { ValidationError } from '../../utils/errors.js';
import { agentServiceName, engineCascadeServices, engineServiceName, isDefaultInstance } from '../service-names.js';
import { parseTarget, targetName } from '../target.js';

describe('parseTarget', () => {
  it('should map a bare host to the default instance', () => {
    expect(parseTarget('sql01')).toEqual({ host: 'sql01', instanceName: 'MSSQLSERVER' });
  });

  it('should read a named instance', () => {
    expect(parseTarget('sql01\\DEV1')).toEqual({ host: 'sql01', instanceName: 'DEV1' });
  });

  it('should normalize an explicit default instance name', () => {
    expect(parseTarget('sql01\\mssqlserver')).toEqual({ host: 'sql01', instanceName: 'MSSQLSERVER' });
  });

  it('should read a port', () => {
    expect(parseTarget('sql01\\DEV1,14330')).toEqual({ host: 'sql01', instanceName: 'DEV1', port: 14330 });
    expect(parseTarget(' sql02,1433 ')).toEqual({ host: 'sql02', instanceName: 'MSSQLSERVER', port: 1433 });
  });

  it('should reject malformed instance strings', () => {
    expect(() => parseTarget('')).toThrow(ValidationError);
    expect(() => parseTarget('sql01\\A\\B')).toThrow(ValidationError);
    expect(() => parseTarget('sql01,port')).toThrow(ValidationError);
    expect(() => parseTarget('sql01,70000')).toThrow("Invalid SQL instance 'sql01,70000': port 70000 is out of range");
  });
});

describe('targetName', () => {
  it('should omit the default instance name', () => {
    expect(targetName({ host: 'sql01', instanceName: 'MSSQLSERVER' })).toBe('sql01');
    expect(targetName({ host: 'sql01', instanceName: 'DEV1' })).toBe('sql01\\DEV1');
  });
});

describe('service names', () => {
  it('should use the reserved names for the default instance', () => {
    expect(engineServiceName('MSSQLSERVER')).toBe('MSSQLSERVER');
    expect(agentServiceName('MSSQLSERVER')).toBe('SQLSERVERAGENT');
    expect(agentServiceName('mssqlserver')).toBe('SQLSERVERAGENT');
    expect(agentServiceName()).toBe('SQLSERVERAGENT');
  });

  it('should template the names of a named instance', () => {
    expect(engineServiceName('DEV1')).toBe('MSSQL$DEV1');
    expect(agentServiceName('DEV1')).toBe('SQLAgent$DEV1');
  });

  it('should order the cascade agent first', () => {
    expect(engineCascadeServices('DEV1')).toEqual(['SQLAgent$DEV1', 'MSSQL$DEV1']);
    expect(engineCascadeServices('MSSQLSERVER')).toEqual(['SQLSERVERAGENT', 'MSSQLSERVER']);
  });

  it('should treat an empty name as the default instance', () => {
    expect(isDefaultInstance('')).toBe(true);
    expect(isDefaultInstance('PROD')).toBe(false);
  });
});
