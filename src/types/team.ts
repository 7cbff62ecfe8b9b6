/** Team as described by an upstream source. */
export interface Team {
  /** Identifier within the source's namespace */
  id: number;
  name: string;
  slug: string | null;
  countryCode: string | null;
  logoUrl: string | null;
}

export interface Tournament {
  id: number;
  name: string;
  slug: string | null;
  /** 's', 'a', 'b', ... */
  tier: string | null;
  tierRank: number | null;
  prize: number | null;
  disciplineId: number | null;
  status: string | null;
  startDate: Date | null;
  endDate: Date | null;
}
