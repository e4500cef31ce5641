import { BadRequestException, ForbiddenException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { BlockchainService } from '../blockchain/blockchain.service';
import { JournaledMap } from '../blockchain/journaled-map';
import { Address, isZeroAddress, normalizeAddress, sameAddress } from '../../common/addresses';

/** Called before the recorded owner of `assetId` changes. Throwing aborts the transfer. */
export type PreTransferHook = (assetId: bigint, from: Address, to: Address | null) => void;

/**
 * Ownership ledger for uniquely identified assets: owners, per-asset approvals
 * and operator approvals. Every owner change, including burn, goes through
 * `moveOwnership`, which runs the registered pre-transfer hooks first.
 */
@Injectable()
export class AssetsService {
  private readonly logger = new Logger(AssetsService.name);
  private readonly owners: JournaledMap<string, Address>;
  private readonly approvals: JournaledMap<string, Address>;
  private readonly operators: JournaledMap<string, boolean>;
  private readonly hooks: PreTransferHook[] = [];
  private nextAssetId = 1n;

  constructor(private readonly chain: BlockchainService) {
    this.owners = new JournaledMap(chain);
    this.approvals = new JournaledMap(chain);
    this.operators = new JournaledMap(chain);
  }

  onBeforeTransfer(hook: PreTransferHook): () => void {
    this.hooks.push(hook);
    return () => {
      const index = this.hooks.indexOf(hook);
      if (index >= 0) {
        this.hooks.splice(index, 1);
      }
    };
  }

  mint(to: Address): bigint {
    const recipient = this.requireRecipient(to);
    return this.chain.atomic(() => {
      const assetId = this.nextAssetId;
      this.nextAssetId++;
      this.chain.recordUndo(() => {
        this.nextAssetId = assetId;
      });
      this.owners.set(assetId.toString(), recipient);
      this.logger.log(`Minted asset #${assetId} to ${recipient}`);
      return assetId;
    });
  }

  exists(assetId: bigint): boolean {
    return this.owners.has(assetId.toString());
  }

  ownerOf(assetId: bigint): Address {
    const owner = this.owners.get(assetId.toString());
    if (!owner) {
      throw new NotFoundException(`Asset #${assetId} does not exist`);
    }
    return owner;
  }

  getApproved(assetId: bigint): Address | null {
    this.ownerOf(assetId);
    return this.approvals.get(assetId.toString()) ?? null;
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return this.operators.get(this.operatorKey(owner, operator)) === true;
  }

  /** Owner, the address approved for this asset, or an operator of the owner. */
  isApprovedOrOwner(spender: Address, assetId: bigint): boolean {
    const owner = this.ownerOf(assetId);
    if (sameAddress(spender, owner)) {
      return true;
    }
    const approved = this.approvals.get(assetId.toString());
    if (approved && sameAddress(spender, approved)) {
      return true;
    }
    return this.isApprovedForAll(owner, spender);
  }

  approve(caller: Address, approved: Address | null, assetId: bigint): void {
    const owner = this.ownerOf(assetId);
    if (!sameAddress(caller, owner) && !this.isApprovedForAll(owner, caller)) {
      throw new ForbiddenException(`${caller} cannot approve asset #${assetId}`);
    }
    this.chain.atomic(() => {
      if (approved === null || isZeroAddress(approved)) {
        this.approvals.delete(assetId.toString());
      } else {
        this.approvals.set(assetId.toString(), normalizeAddress(approved, 'approved'));
      }
    });
  }

  setApprovalForAll(owner: Address, operator: Address, approved: boolean): void {
    const key = this.operatorKey(owner, normalizeAddress(operator, 'operator'));
    this.chain.atomic(() => {
      if (approved) {
        this.operators.set(key, true);
      } else {
        this.operators.delete(key);
      }
    });
  }

  /** Public transfer path: `caller` must be the owner or approved. */
  transferFrom(caller: Address, from: Address, to: Address, assetId: bigint): void {
    const owner = this.ownerOf(assetId);
    if (!sameAddress(owner, from)) {
      throw new ForbiddenException(`Asset #${assetId} is not owned by ${from}`);
    }
    if (!this.isApprovedOrOwner(caller, assetId)) {
      throw new ForbiddenException(`${caller} is neither owner nor approved for asset #${assetId}`);
    }
    this.transfer(from, to, assetId);
  }

  /** Privileged transfer path used by the marketplace once a sale is settled. */
  transfer(from: Address, to: Address, assetId: bigint): void {
    const recipient = this.requireRecipient(to);
    const owner = this.ownerOf(assetId);
    if (!sameAddress(owner, from)) {
      throw new ForbiddenException(`Asset #${assetId} is not owned by ${from}`);
    }
    this.chain.atomic(() => this.moveOwnership(assetId, owner, recipient));
  }

  burn(caller: Address, assetId: bigint): void {
    const owner = this.ownerOf(assetId);
    if (!this.isApprovedOrOwner(caller, assetId)) {
      throw new ForbiddenException(`${caller} cannot burn asset #${assetId}`);
    }
    this.chain.atomic(() => this.moveOwnership(assetId, owner, null));
  }

  private moveOwnership(assetId: bigint, from: Address, to: Address | null): void {
    for (const hook of [...this.hooks]) {
      hook(assetId, from, to);
    }
    const key = assetId.toString();
    this.approvals.delete(key);
    if (to === null) {
      this.owners.delete(key);
      this.logger.log(`Burned asset #${assetId} held by ${from}`);
    } else {
      this.owners.set(key, to);
      this.logger.log(`Transferred asset #${assetId} from ${from} to ${to}`);
    }
  }

  private requireRecipient(to: Address): Address {
    const recipient = normalizeAddress(to, 'recipient');
    if (isZeroAddress(recipient)) {
      throw new BadRequestException('Cannot transfer to the zero address');
    }
    return recipient;
  }

  private operatorKey(owner: Address, operator: Address): string {
    return `${owner.toLowerCase()}:${operator.toLowerCase()}`;
  }
}
