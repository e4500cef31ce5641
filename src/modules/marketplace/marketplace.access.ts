import { AssetsService } from '../assets/assets.service';
import { Address } from '../../common/addresses';
import { MarketplaceException } from './marketplace.errors';

/** Owner, approved operator or approved address of `assetId`; returns the owner. */
export function assertOwnerOrApproved(assets: AssetsService, assetId: bigint, caller: Address): Address {
  const owner = assets.exists(assetId) ? assets.ownerOf(assetId) : null;
  if (owner === null || !assets.isApprovedOrOwner(caller, assetId)) {
    throw new MarketplaceException(
      'CallerIsntOwnerNorApproved',
      `${caller} is neither owner nor approved for asset #${assetId}`,
    );
  }
  return owner;
}
