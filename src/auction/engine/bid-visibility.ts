import type { AuctionBidRecord } from './types';

export interface BidViewer {
  userId: string | null;
  isStaff: boolean;
}

/**
 * Bids a viewer may see on one item. Staff and the owning gallery's owner get
 * the full history by amount descending; everyone else gets the winning bid
 * first, then their own non-winning bids.
 */
export function visibleBids(
  bids: readonly AuctionBidRecord[],
  viewer: BidViewer,
  galleryOwnerId: string | null,
): AuctionBidRecord[] {
  const privileged =
    viewer.isStaff ||
    (viewer.userId !== null && galleryOwnerId === viewer.userId);
  if (privileged) {
    return [...bids].sort((a, b) => b.amount - a.amount || b.id - a.id);
  }

  const result: AuctionBidRecord[] = [];
  const winner = bids.find((b) => b.isWinner);
  if (winner) result.push(winner);
  if (viewer.userId === null) return result;

  for (const bid of bids) {
    if (bid.userId === viewer.userId && !bid.isWinner) result.push(bid);
  }
  return result;
}
