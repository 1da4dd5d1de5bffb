/**
 * Holder Inventory Tests
 */

import { AssetLedger } from '../AssetLedger.js'
import { AssetId } from '../AssetId.js'
import { ArithmeticTrap, LedgerError } from '../errors.js'
import { HolderInventory } from '../HolderInventory.js'
import type { LedgerErrorCode } from '../errors.js'
import type { AssetIdentity } from '../types.js'

const CREATOR = '0xc0ffee'
const HOLDER = '0xb0b'
const CAROL = '0xca401'

function expectLedgerError(fn: () => unknown, code: LedgerErrorCode): void {
  let caught: unknown
  try {
    fn()
  } catch (error) {
    caught = error
  }
  expect(caught).toBeInstanceOf(LedgerError)
  expect(caught).toMatchObject({ code })
}

describe('Holder inventory', () => {
  let ledger: AssetLedger
  let gold: AssetIdentity

  beforeEach(() => {
    ledger = new AssetLedger()
    ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
    gold = ledger.createUnlimitedToken(CREATOR, 'Sets', 'Gold', '', true, 5, '', 0)
  })

  describe('initialization', () => {
    it('is idempotent', () => {
      ledger.initializeInventory(HOLDER)
      ledger.initializeInventory(HOLDER)

      expect(ledger.balancesOf(HOLDER)).toEqual([])
      expect(ledger.version).toBe(4)
    })

    it('opens a zero slot once', () => {
      ledger.initializeSlotFor(HOLDER, CREATOR, 'Sets', 'Gold')

      expect(ledger.balancesOf(HOLDER)).toEqual([{ identity: gold, amount: 0 }])
      expectLedgerError(() => ledger.initializeSlotFor(HOLDER, CREATOR, 'Sets', 'Gold'), 'AlreadyHasBalance')
    })

    it('requires an inventory before opening a slot directly', () => {
      expectLedgerError(
        () => ledger.execute(tx => ledger.inventories.initializeSlot(tx, HOLDER, gold)),
        'StoreNotPublished'
      )
    })
  })

  describe('queries', () => {
    it('reports zero for accounts without an inventory or slot', () => {
      expect(ledger.balanceOf(HOLDER, gold)).toBe(0)
      expect(ledger.balanceOf(CREATOR, AssetId.create(CREATOR, 'Sets', 'Silver'))).toBe(0)
      expect(ledger.balancesOf(HOLDER)).toEqual([])
    })

    it('exposes held amounts but not the stored units', () => {
      const held = ledger.execute(tx => tx.inventoryOf(CREATOR)?.amountOf(gold))

      expect(held).toBe(5)
      expect(Object.getOwnPropertyNames(HolderInventory.prototype).sort())
        .toEqual(['amountOf', 'balances', 'clone', 'constructor', 'hasSlot'])
    })

    it('normalizes the account address', () => {
      expect(ledger.balanceOf('0xC0FFEE', gold)).toBe(5)
    })
  })

  describe('withdraw', () => {
    it('scenario C: fails without a slot for the identity', () => {
      ledger.initializeInventory(HOLDER)

      expectLedgerError(() => ledger.transfer(HOLDER, CAROL, CREATOR, 'Sets', 'Gold', 1), 'BalanceNotPublished')
    })

    it('fails for an account with no inventory', () => {
      expectLedgerError(() => ledger.transfer(HOLDER, CAROL, CREATOR, 'Sets', 'Gold', 1), 'StoreNotPublished')
    })

    it('traps on underflow without a ledger code', () => {
      let caught: unknown
      try {
        ledger.transfer(CREATOR, HOLDER, CREATOR, 'Sets', 'Gold', 6)
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(ArithmeticTrap)
      expect(caught).not.toBeInstanceOf(LedgerError)
      expect(ledger.balanceOf(CREATOR, gold)).toBe(5)
      expect(ledger.balanceOf(HOLDER, gold)).toBe(0)
    })
  })

  describe('transfer', () => {
    it('scenario D: moves value and conserves supply', () => {
      ledger.directTransfer(CREATOR, HOLDER, CREATOR, 'Sets', 'Gold', 2)
      ledger.directTransfer(HOLDER, CREATOR, CREATOR, 'Sets', 'Gold', 1)

      expect(ledger.balanceOf(CREATOR, gold)).toBe(4)
      expect(ledger.balanceOf(HOLDER, gold)).toBe(1)
      expect(ledger.supplyOf(gold)).toBe(5)
    })

    it('creates the receiver inventory and slot on demand', () => {
      ledger.transfer(CREATOR, HOLDER, CREATOR, 'Sets', 'Gold', 2)

      expect(ledger.balancesOf(HOLDER)).toEqual([{ identity: gold, amount: 2 }])
    })

    it('keeps the sender slot at zero after moving everything', () => {
      ledger.transfer(CREATOR, HOLDER, CREATOR, 'Sets', 'Gold', 5)

      expect(ledger.balancesOf(CREATOR)).toEqual([{ identity: gold, amount: 0 }])
    })

    it('allows a transfer to self', () => {
      ledger.transfer(CREATOR, CREATOR, CREATOR, 'Sets', 'Gold', 3)
      expect(ledger.balanceOf(CREATOR, gold)).toBe(5)
    })

    it('rejects non-integer amounts', () => {
      expectLedgerError(() => ledger.transfer(CREATOR, HOLDER, CREATOR, 'Sets', 'Gold', 0.5), 'InvalidArgument')
    })

    it('emits withdraw and deposit events on the two inventories', () => {
      ledger.transfer(CREATOR, HOLDER, CREATOR, 'Sets', 'Gold', 2)

      expect(ledger.eventsOf(CREATOR, 'withdraw').map(record => record.data)).toEqual([
        { type: 'Withdrawn', identity: gold, amount: 2 }
      ])
      const deposits = ledger.eventsOf(HOLDER, 'deposit')
      expect(deposits.map(record => record.data)).toEqual([{ type: 'Deposited', identity: gold, amount: 2 }])
      expect(deposits[0].sequence).toBe(0)
    })

    it('keeps the sum of balances equal to tracked supply', () => {
      ledger.transfer(CREATOR, HOLDER, CREATOR, 'Sets', 'Gold', 2)
      ledger.transfer(HOLDER, CAROL, CREATOR, 'Sets', 'Gold', 1)
      ledger.mint(CREATOR, CAROL, CREATOR, 'Sets', 'Gold', 4)

      const total = [CREATOR, HOLDER, CAROL]
        .map(account => ledger.balanceOf(account, gold))
        .reduce((sum, amount) => sum + amount, 0)
      expect(total).toBe(9)
      expect(ledger.supplyOf(gold)).toBe(9)
    })
  })

  describe('deposit', () => {
    it('splits one withdrawal across several receivers', () => {
      ledger.execute(tx => {
        const unit = ledger.inventories.withdraw(tx, CREATOR, gold, 5)
        ledger.inventories.deposit(tx, HOLDER, unit.split(2))
        ledger.inventories.deposit(tx, CAROL, unit)
      })

      expect(ledger.balanceOf(CREATOR, gold)).toBe(0)
      expect(ledger.balanceOf(HOLDER, gold)).toBe(2)
      expect(ledger.balanceOf(CAROL, gold)).toBe(3)
    })

    it('can skip the deposit event', () => {
      ledger.execute(tx => {
        const unit = ledger.inventories.withdraw(tx, CREATOR, gold, 1)
        ledger.inventories.depositWithoutEvent(tx, HOLDER, unit)
      })

      expect(ledger.balanceOf(HOLDER, gold)).toBe(1)
      expect(ledger.eventsOf(HOLDER, 'deposit')).toEqual([])
    })
  })
})
