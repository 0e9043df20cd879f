/**
 * Unit tests for the registry GML readers
 */

import { describe, it, expect } from 'vitest';
import { utmToLonLat } from '../geo/utm.js';
import { parsePosList, parseStaticExtract, parseWfsResponse, readGeometry, wgs84 } from './gml-parser.js';

const STATIC_EXTRACT = `<?xml version="1.0" encoding="UTF-8"?>
<gml:FeatureCollection xmlns:gml="http://www.opengis.net/gml/3.2"
  xmlns:app="http://skjema.geonorge.no/SOSI/produktspesifikasjon/StedsnavnForVanligBruk/20181115">
  <gml:featureMember>
    <app:Sted gml:id="sted.1001">
      <app:stedsnummer>1001</app:stedsnummer>
      <app:navneobjekttype>gard</app:navneobjekttype>
      <app:navneobjektgruppe>bebyggelse</app:navneobjektgruppe>
      <app:navneobjekthovedgruppe>bebyggelse</app:navneobjekthovedgruppe>
      <app:språkprioritering>norsk</app:språkprioritering>
      <app:oppdateringsdato>2019-03-14T10:00:00</app:oppdateringsdato>
      <app:kommune>
        <app:Kommune>
          <app:kommunenummer>0301</app:kommunenummer>
          <app:kommunenavn>Oslo</app:kommunenavn>
        </app:Kommune>
      </app:kommune>
      <app:posisjon>
        <gml:Point gml:id="p.1001" srsName="EPSG:25833">
          <gml:pos>260000 6650000</gml:pos>
        </gml:Point>
      </app:posisjon>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:offentligBruk>true</app:offentligBruk>
          <app:navnestatus>hovednavn</app:navnestatus>
          <app:språk>norsk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:komplettskrivemåte>Nordgard</app:komplettskrivemåte>
              <app:skrivemåtestatus>vedtatt</app:skrivemåtestatus>
            </app:Skrivemåte>
          </app:skrivemåte>
          <app:annenSkrivemåte>
            <app:Skrivemåte>
              <app:komplettskrivemåte>Nordgarden</app:komplettskrivemåte>
              <app:skrivemåtestatus>godkjent</app:skrivemåtestatus>
            </app:Skrivemåte>
          </app:annenSkrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:offentligBruk>false</app:offentligBruk>
          <app:navnestatus>historisk</app:navnestatus>
          <app:språk>norsk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:komplettskrivemåte>Nordgaard</app:komplettskrivemåte>
              <app:skrivemåtestatus>historisk</app:skrivemåtestatus>
            </app:Skrivemåte>
          </app:skrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
    </app:Sted>
  </gml:featureMember>
  <gml:featureMember>
    <app:Sted gml:id="sted.1002">
      <app:stedsnummer>1002</app:stedsnummer>
      <app:navneobjekttype>elv</app:navneobjekttype>
      <app:kommune><app:Kommune><app:kommunenummer>0301</app:kommunenummer></app:Kommune></app:kommune>
      <app:senterlinje>
        <gml:LineString gml:id="l.1002">
          <gml:posList>260000 6650000 260100 6650100</gml:posList>
        </gml:LineString>
      </app:senterlinje>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:offentligBruk>true</app:offentligBruk>
          <app:navnestatus>undernavn</app:navnestatus>
          <app:språk>norsk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:komplettskrivemåte>Bekken</app:komplettskrivemåte>
              <app:skrivemåtestatus>vedtatt</app:skrivemåtestatus>
            </app:Skrivemåte>
          </app:skrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:offentligBruk>true</app:offentligBruk>
          <app:navnestatus>hovednavn</app:navnestatus>
          <app:språk>norsk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:komplettskrivemåte>Storbekken</app:komplettskrivemåte>
              <app:skrivemåtestatus>foreslått</app:skrivemåtestatus>
            </app:Skrivemåte>
          </app:skrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
    </app:Sted>
  </gml:featureMember>
  <gml:featureMember>
    <app:Sted gml:id="sted.1003">
      <app:stedsnummer>1003</app:stedsnummer>
      <app:kommune><app:Kommune><app:kommunenummer>0301</app:kommunenummer></app:Kommune></app:kommune>
    </app:Sted>
  </gml:featureMember>
</gml:FeatureCollection>`;

const WFS_RESPONSE = `<?xml version="1.0" encoding="UTF-8"?>
<wfs:FeatureCollection xmlns:wfs="http://www.opengis.net/wfs/2.0" xmlns:gml="http://www.opengis.net/gml/3.2"
  xmlns:app="http://skjema.geonorge.no/SOSI/produktspesifikasjon/Stedsnavn/5.0">
  <wfs:member>
    <app:Sted gml:id="s.2001">
      <app:stedstatus>aktiv</app:stedstatus>
      <app:stedsnummer>2001</app:stedsnummer>
      <app:navneobjekttype>vik</app:navneobjekttype>
      <app:språkprioritering>nordsamisk-norsk</app:språkprioritering>
      <app:kommune><app:Kommune><app:kommunenummer>5501</app:kommunenummer></app:Kommune></app:kommune>
      <app:posisjon>
        <gml:MultiPoint>
          <gml:pointMember><gml:Point><gml:pos>18.95 69.65</gml:pos></gml:Point></gml:pointMember>
          <gml:pointMember><gml:Point><gml:pos>18.96 69.66</gml:pos></gml:Point></gml:pointMember>
        </gml:MultiPoint>
      </app:posisjon>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:navnestatus>hovednavn</app:navnestatus>
          <app:språk>nordsamisk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:langnavn>Romsavuotna</app:langnavn>
              <app:skrivemåtestatus>godkjent</app:skrivemåtestatus>
              <app:prioritertSkrivemåte>true</app:prioritertSkrivemåte>
            </app:Skrivemåte>
          </app:skrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:navnestatus>hovednavn</app:navnestatus>
          <app:språk>norsk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:langnavn>Romsvika</app:langnavn>
              <app:skrivemåtestatus>vedtatt</app:skrivemåtestatus>
              <app:prioritertSkrivemåte>false</app:prioritertSkrivemåte>
            </app:Skrivemåte>
          </app:skrivemåte>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:langnavn>Romsvik</app:langnavn>
              <app:skrivemåtestatus>avslått</app:skrivemåtestatus>
            </app:Skrivemåte>
          </app:skrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:navnestatus>feilført</app:navnestatus>
          <app:språk>norsk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:langnavn>Feilvik</app:langnavn>
              <app:skrivemåtestatus>vedtatt</app:skrivemåtestatus>
            </app:Skrivemåte>
          </app:skrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
    </app:Sted>
  </wfs:member>
  <wfs:member>
    <app:Sted gml:id="s.2002">
      <app:stedstatus>historisk</app:stedstatus>
      <app:stedsnummer>2002</app:stedsnummer>
      <app:navneobjekttype>gard</app:navneobjekttype>
    </app:Sted>
  </wfs:member>
  <wfs:member>
    <app:Sted gml:id="s.2003">
      <app:stedstatus>relikt</app:stedstatus>
      <app:stedsnummer>2003</app:stedsnummer>
      <app:navneobjekttype>innsjø</app:navneobjekttype>
      <app:kommune><app:Kommune><app:kommunenummer>5501</app:kommunenummer></app:Kommune></app:kommune>
      <app:posisjon>
        <gml:Polygon>
          <gml:exterior>
            <gml:LinearRing>
              <gml:posList>19 69 19.1 69 19.1 69.1 19 69</gml:posList>
            </gml:LinearRing>
          </gml:exterior>
        </gml:Polygon>
      </app:posisjon>
      <app:stedsnavn>
        <app:Stedsnavn>
          <app:navnestatus>hovednavn</app:navnestatus>
          <app:språk>norsk</app:språk>
          <app:skrivemåte>
            <app:Skrivemåte>
              <app:langnavn>Langvatnet</app:langnavn>
              <app:skrivemåtestatus>godkjent</app:skrivemåtestatus>
              <app:prioritertSkrivemåte>true</app:prioritertSkrivemåte>
            </app:Skrivemåte>
          </app:skrivemåte>
        </app:Stedsnavn>
      </app:stedsnavn>
    </app:Sted>
  </wfs:member>
</wfs:FeatureCollection>`;

function caught(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('parsePosList', () => {
  it('should pair coordinates and ignore a trailing odd value', () => {
    expect(parsePosList(' 10 60\n 11 61 12 ', wgs84)).toEqual([
      [10, 60],
      [11, 61],
    ]);
  });

  it('should return nothing for an absent list', () => {
    expect(parsePosList(undefined, wgs84)).toEqual([]);
  });
});

describe('readGeometry', () => {
  it('should return undefined for an empty property', () => {
    expect(readGeometry(undefined, wgs84)).toBeUndefined();
    expect(readGeometry({ Surface: {} }, wgs84)).toBeUndefined();
  });

  it('should take the first curve of a MultiCurve', () => {
    const property = {
      MultiCurve: {
        curveMember: [{ LineString: { posList: '5 60 6 61' } }, { LineString: { posList: '7 62 8 63' } }],
      },
    };

    expect(readGeometry(property, wgs84)).toEqual({
      type: 'LineString',
      coordinates: [
        [5, 60],
        [6, 61],
      ],
    });
  });
});

describe('parseStaticExtract', () => {
  const records = parseStaticExtract(STATIC_EXTRACT);

  it('should read every feature member', () => {
    expect(records.map(record => record.placeId)).toEqual(['1001', '1002', '1003']);
  });

  it('should read the place header', () => {
    expect(records[0]).toMatchObject({
      nameTypeCode: 'gard',
      group: 'bebyggelse',
      mainGroup: 'bebyggelse',
      municipalityCode: '0301',
      languagePriority: 'norsk',
      registeredAt: '2019-03-14',
    });
  });

  it('should project UTM 33 positions to lon/lat', () => {
    expect(records[0].geometry).toEqual({ type: 'Point', coordinates: utmToLonLat(260000, 6650000, 33) });
    expect(records[1].geometry).toEqual({
      type: 'LineString',
      coordinates: [utmToLonLat(260000, 6650000, 33), utmToLonLat(260100, 6650100, 33)],
    });
  });

  it('should only give priority to the main spelling of a public name', () => {
    expect(records[0].names).toEqual([
      { text: 'Nordgard', language: 'norsk', nameTypeCode: 'gard', priority: true, historic: false, status: 'vedtatt' },
      {
        text: 'Nordgarden',
        language: 'norsk',
        nameTypeCode: 'gard',
        priority: false,
        historic: false,
        status: 'godkjent',
      },
      {
        text: 'Nordgaard',
        language: 'norsk',
        nameTypeCode: 'gard',
        priority: false,
        historic: true,
        status: 'historisk',
      },
    ]);
  });

  it('should not prioritise sub-names or proposed spellings', () => {
    expect(records[1].names.map(entry => [entry.text, entry.priority])).toEqual([
      ['Bekken', false],
      ['Storbekken', false],
    ]);
  });

  it('should leave missing type and geometry to the normalizer', () => {
    expect(records[2]).toMatchObject({ nameTypeCode: '', geometry: undefined, names: [] });
  });

  it('should reject malformed XML', () => {
    const error = caught(() => parseStaticExtract('<a><b></a>'));

    expect(error).toMatchObject({
      code: 'SOURCE_UNAVAILABLE',
      message: expect.stringContaining('Static extract is not valid XML'),
    });
  });

  it('should reject a document without a feature collection', () => {
    const error = caught(() => parseStaticExtract('<root/>'));

    expect(error).toMatchObject({
      code: 'SOURCE_UNAVAILABLE',
      message: 'Static extract has no feature collection',
    });
  });
});

describe('parseWfsResponse', () => {
  const records = parseWfsResponse(WFS_RESPONSE);

  it('should keep active and relic places only', () => {
    expect(records.map(record => record.placeId)).toEqual(['2001', '2003']);
  });

  it('should keep every point of a MultiPoint', () => {
    expect(records[0].geometry).toEqual({
      type: 'MultiPoint',
      coordinates: [
        [18.95, 69.65],
        [18.96, 69.66],
      ],
    });
  });

  it('should read a polygon exterior', () => {
    expect(records[1].geometry).toEqual({
      type: 'Polygon',
      coordinates: [
        [
          [19, 69],
          [19.1, 69],
          [19.1, 69.1],
          [19, 69],
        ],
      ],
    });
  });

  it('should use the priority flag or an accepted status and drop rejected names', () => {
    expect(records[0].names).toEqual([
      {
        text: 'Romsavuotna',
        language: 'nordsamisk',
        nameTypeCode: 'vik',
        priority: true,
        historic: false,
        status: 'godkjent',
      },
      {
        text: 'Romsvika',
        language: 'norsk',
        nameTypeCode: 'vik',
        priority: true,
        historic: false,
        status: 'vedtatt',
      },
    ]);
    expect(records[0].languagePriority).toBe('nordsamisk-norsk');
  });

  it('should surface a WFS exception report', () => {
    const report = `<ows:ExceptionReport xmlns:ows="http://www.opengis.net/ows/1.1">
  <ows:Exception exceptionCode="InvalidParameterValue">
    <ows:ExceptionText>Unknown feature type</ows:ExceptionText>
  </ows:Exception>
</ows:ExceptionReport>`;

    const error = caught(() => parseWfsResponse(report));

    expect(error).toMatchObject({
      code: 'LOOKUP_FAILED',
      message: 'WFS response returned an exception: Unknown feature type',
    });
  });
});
