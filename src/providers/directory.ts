// src/providers/directory.ts
import type { Provider } from './base.js'
import type { InfraResult, ProviderId } from '../core/types.js'
import { createInfraResult } from '../core/types.js'

export const PORTAL_LINKS: Readonly<Record<string, string>> = Object.freeze({
  'Türk Telekom Altyapı Sorgu': 'https://www.turktelekom.com.tr/altyapi-sorgulama',
  'TT Kapsama Haritası': 'https://kapsamaharitasi.turktelekom.com.tr/',
  'Turkcell Superonline': 'https://www.superonline.net/altyapi-sorgulama',
  'Turkcell (Superbox/Altyapı)': 'https://www.turkcell.com.tr/tr/altyapi-sorgulama',
  'Millenicom': 'https://www.milleni.com.tr/internet-altyapi-sorgulama',
  'Netspeed': 'https://www.netspeed.com.tr/altyapi-sorgula',
  'BTK – EHABS (e-Devlet)':
    'https://www.turkiye.gov.tr/btk-elektronik-haberlesme-altyapi-bilgi-sistemi-ehabs-hizmetleri-4302',
})

/** Points the user at official self-service lookup portals. The address is not used. */
export class DirectoryProvider implements Provider {
  readonly id: ProviderId = 'directory'
  readonly name = 'Official Portals'

  async query(): Promise<InfraResult[]> {
    return [
      createInfraResult({
        providerName: this.name,
        technology: 'Redirect',
        rawDetails: { ...PORTAL_LINKS },
      }),
    ]
  }
}
