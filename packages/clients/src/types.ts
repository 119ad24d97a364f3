/** Attribute map of one parcel feature as returned by the layer query */
export type PropertyRecord = Record<string, unknown>;

/** Esri JSON polygon; rings are arrays of [x, y] (lon, lat) vertices */
export interface EsriPolygon {
  rings: Array<Array<[number, number]>>;
  spatialReference: { wkid: number };
}

/**
 * Backend query payload for one layer query, before pagination.
 * Serialised to URL parameters by `toQueryParams`.
 */
export interface QueryDescriptor {
  /** Filter geometry; omitted for attribute-only queries */
  geometry?: EsriPolygon;
  spatialRel: "esriSpatialRelIntersects";
  /** WHERE-style predicate; omitted when there is nothing to filter on */
  where?: string;
  /** "*" or explicit field names */
  outFields: "*" | string[];
  returnGeometry: boolean;
  /** Output spatial reference (102100 = Web Mercator) */
  outSR: number;
}

export interface PageRequest {
  offset: number;
  limit: number;
}

/** Anything that can run one page of a layer query */
export interface ParcelQueryClient {
  queryPage(descriptor: QueryDescriptor, page: PageRequest): Promise<PropertyRecord[]>;
  lookupParcel(catastro: string): Promise<PropertyRecord | null>;
}
