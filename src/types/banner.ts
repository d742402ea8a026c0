/**
 * Text shown for a game in the console's menu. PAL banners carry one record
 * per language.
 */
export interface BannerMetadata {
  readonly gameName: string;
  readonly developerName: string;
  readonly fullGameTitle: string;
  readonly fullDeveloperName: string;
  readonly gameDescription: string;
}
