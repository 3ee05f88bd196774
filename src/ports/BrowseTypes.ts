/**
 * One level of a media library as returned by a device's browse endpoint.
 */
export interface BrowseNode {
  title: string;
  mediaClass?: string;
  mediaContentId: string;
  mediaContentType: string;
  canPlay: boolean;
  canExpand: boolean;
  thumbnail?: string | null;
  children?: BrowseNode[];
}
