export {
  BidValidator,
  DEFAULT_BID_POLICY,
  MAX_BID_AMOUNT,
  isAcceptingBids,
  minimumNextBid,
} from './bid-validator';
export {
  AuctionInvariantError,
  canTransitionEvent,
  canTransitionItem,
  isClosingSoon,
  planEventTransition,
  settleItem,
} from './lifecycle';
export { visibleBids } from './bid-visibility';
export type { BidViewer } from './bid-visibility';
export { AUCTION_EVENT_STATUSES, AUCTION_ITEM_STATUSES } from './types';
export type {
  AuctionBidRecord,
  AuctionEventState,
  AuctionEventStatus,
  AuctionItemState,
  AuctionItemStatus,
  BidField,
  BidPolicy,
  BidRejectCode,
  BidValidationInput,
  BidValidationResult,
  EventTransition,
  ItemSettlement,
} from './types';
