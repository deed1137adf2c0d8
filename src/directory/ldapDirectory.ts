/**
 * Active Directory over LDAP
 * One bound connection per run: connect() before the first lookup,
 * close() when the report is written.
 */

import { AndFilter, Client, EqualityFilter } from 'ldapts';
import type { SearchOptions } from 'ldapts';
import type { LdapSettings } from '../config.js';
import { DirectoryError, errorMessage } from '../errors.js';
import type { DirectoryAccount } from '../types.js';
import type { DirectorySession, OnPremDirectory } from './types.js';

export type AttributeValue = string | string[] | Buffer | Buffer[];

export type LdapEntry = {
  dn: string;
  [attribute: string]: AttributeValue;
};

/** The slice of ldapts' Client this directory uses */
export interface LdapConnection {
  bind(dn: string, password: string): Promise<void>;
  unbind(): Promise<void>;
  search(baseDN: string, options: SearchOptions): Promise<{ searchEntries: LdapEntry[] }>;
}

export type LdapConnectionFactory = (settings: LdapSettings) => LdapConnection;

const UAC_ACCOUNT_DISABLED = 0x0002;

export const ACCOUNT_ATTRIBUTES = [
  'userAccountControl',
  'mobile',
  'generationQualifier',
  'manager',
  'mail',
  'title',
  'company',
  'department',
  'description',
  'lastLogon',
  'pwdLastSet',
  'lastLogonTimestamp',
  'whenCreated',
  'distinguishedName'
];

export const createLdapConnection: LdapConnectionFactory = (settings) =>
  new Client({
    url: settings.url,
    timeout: settings.timeout,
    connectTimeout: settings.connectTimeout,
    tlsOptions: {
      minVersion: 'TLSv1.2'
    }
  });

/**
 * First value of a possibly multi-valued attribute, Buffers decoded as UTF-8
 */
export function firstValue(value: AttributeValue | undefined): string | undefined {
  if (value === undefined) return undefined;
  const first = Array.isArray(value) ? value[0] : value;
  if (first === undefined) return undefined;
  return typeof first === 'string' ? first : first.toString('utf8');
}

export function isAccountEnabled(userAccountControl: string | undefined): boolean {
  if (userAccountControl === undefined) return false;
  const uac = Number.parseInt(userAccountControl, 10);
  if (Number.isNaN(uac)) return false;
  return (uac & UAC_ACCOUNT_DISABLED) === 0;
}

/**
 * CN of a distinguished name: "CN=Jane Doe,OU=Staff,DC=corp" -> "Jane Doe"
 */
export function commonNameOf(dn: string): string {
  const match = /^CN=((?:\\.|[^,])+),/i.exec(dn);
  return match ? match[1].replace(/\\(.)/g, '$1') : dn;
}

export function toDirectoryAccount(entry: LdapEntry): DirectoryAccount {
  const attr = (name: string) => firstValue(entry[name]);
  return {
    enabled: isAccountEnabled(attr('userAccountControl')),
    distinguishedName: attr('distinguishedName') ?? entry.dn,
    mobile: attr('mobile'),
    generationQualifier: attr('generationQualifier'),
    managerRef: attr('manager'),
    mail: attr('mail'),
    title: attr('title'),
    company: attr('company'),
    department: attr('department'),
    description: attr('description'),
    lastLogon: attr('lastLogon'),
    pwdLastSet: attr('pwdLastSet'),
    lastLogonTimestamp: attr('lastLogonTimestamp'),
    whenCreated: attr('whenCreated')
  };
}

export class LdapDirectory implements OnPremDirectory, DirectorySession {
  private connection: LdapConnection | null = null;

  constructor(
    private readonly settings: LdapSettings,
    private readonly connectionFactory: LdapConnectionFactory = createLdapConnection
  ) {}

  async connect(): Promise<void> {
    if (this.connection) return;
    const connection = this.connectionFactory(this.settings);
    try {
      await connection.bind(this.settings.bindDN, this.settings.bindPassword);
    } catch (err) {
      throw new DirectoryError(
        `LDAP bind to ${this.settings.url} as ${this.settings.bindDN} failed: ${errorMessage(err)}`,
        'connect',
        undefined,
        err
      );
    }
    this.connection = connection;
  }

  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (connection) {
      await connection.unbind();
    }
  }

  async testConnection(): Promise<{ success: boolean; error?: string }> {
    try {
      await this.requireConnection('testConnection').search(this.settings.baseDN, {
        scope: 'base',
        filter: '(objectClass=*)',
        attributes: ['objectClass']
      });
      return { success: true };
    } catch (err) {
      return { success: false, error: errorMessage(err) };
    }
  }

  private requireConnection(operation: 'testConnection' | 'findUserByPrincipalName' | 'resolveManagerDisplayName'): LdapConnection {
    if (!this.connection) {
      throw new DirectoryError('LDAP directory is not connected; call connect() first', operation);
    }
    return this.connection;
  }

  async findUserByPrincipalName(principalName: string): Promise<DirectoryAccount | null> {
    const filter = new AndFilter({
      filters: [
        new EqualityFilter({ attribute: 'objectClass', value: 'user' }),
        new EqualityFilter({ attribute: 'objectCategory', value: 'person' }),
        new EqualityFilter({ attribute: 'userPrincipalName', value: principalName })
      ]
    });

    const { searchEntries } = await this.requireConnection('findUserByPrincipalName').search(this.settings.baseDN, {
      scope: 'sub',
      filter,
      attributes: ACCOUNT_ATTRIBUTES
    });

    const entry = searchEntries[0];
    return entry ? toDirectoryAccount(entry) : null;
  }

  async resolveManagerDisplayName(managerRef: string): Promise<string> {
    const { searchEntries } = await this.requireConnection('resolveManagerDisplayName').search(managerRef, {
      scope: 'base',
      filter: '(objectClass=*)',
      attributes: ['displayName']
    });

    const entry = searchEntries[0];
    if (!entry) {
      throw new Error(`Manager object not found: ${managerRef}`);
    }
    return firstValue(entry.displayName) ?? commonNameOf(managerRef);
  }
}
