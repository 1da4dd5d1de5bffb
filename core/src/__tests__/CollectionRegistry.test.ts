/**
 * Collection Registry Tests
 *
 * Collection and token type creation, cap enforcement, and capability-gated
 * mint and burn, driven through the AssetLedger entry operations.
 */

import { AssetLedger } from '../AssetLedger.js'
import { AssetId } from '../AssetId.js'
import { ArithmeticTrap, LedgerError } from '../errors.js'
import type { LedgerErrorCode } from '../errors.js'

const CREATOR = '0xc0ffee'
const HOLDER = '0xb0b'
const OTHER = '0xdead'

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

describe('Collection registry', () => {
  let ledger: AssetLedger

  beforeEach(() => {
    ledger = new AssetLedger()
  })

  describe('createCollection', () => {
    it('publishes the registry lazily and records the collection', () => {
      expect(ledger.getCollection(CREATOR, 'Sets')).toBeUndefined()

      ledger.createLimitedCollection(CREATOR, 'Sets', 'Card sets', 'https://example.com/sets', 2)

      expect(ledger.getCollection(CREATOR, 'Sets')).toEqual({
        name: 'Sets',
        description: 'Card sets',
        uri: 'https://example.com/sets',
        count: 0,
        maximum: 2
      })
    })

    it('creates unlimited collections without a maximum', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Open', '', '')
      expect(ledger.getCollection(CREATOR, 'Open')).toEqual({ name: 'Open', description: '', uri: '', count: 0 })
    })

    it('rejects a second collection with the same name for the same creator', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', 'first', '')

      expectLedgerError(() => ledger.createUnlimitedCollection(CREATOR, 'Sets', 'second', ''), 'CollectionAlreadyExists')
      expect(ledger.getCollection(CREATOR, 'Sets')?.description).toBe('first')
    })

    it('lets different creators reuse a collection name', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      ledger.createUnlimitedCollection(OTHER, 'Sets', '', '')

      expect(ledger.getCollection(OTHER, 'Sets')?.count).toBe(0)
    })

    it('emits a CollectionCreated event', () => {
      ledger.createLimitedCollection(CREATOR, 'Sets', 'Card sets', 'uri', 2)

      expect(ledger.eventsOf(CREATOR, 'creation').map(record => record.data)).toEqual([{
        type: 'CollectionCreated',
        creator: CREATOR,
        name: 'Sets',
        uri: 'uri',
        description: 'Card sets',
        maximum: 2
      }])
    })

    it('validates names against the configured limits', () => {
      const strict = new AssetLedger({ limits: { maxNameLength: 4 } })

      expectLedgerError(() => strict.createUnlimitedCollection(CREATOR, 'Toolong', '', ''), 'InvalidArgument')
      expectLedgerError(() => strict.createUnlimitedCollection(CREATOR, '', '', ''), 'InvalidArgument')
      strict.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      expect(strict.getCollection(CREATOR, 'Sets')?.name).toBe('Sets')
    })
  })

  describe('createTokenType', () => {
    it('requires the registry and the collection', () => {
      expectLedgerError(
        () => ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 0, '', 0),
        'RegistryNotPublished'
      )

      ledger.createUnlimitedCollection(CREATOR, 'Other', '', '')
      expectLedgerError(
        () => ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 0, '', 0),
        'CollectionNotPublished'
      )
    })

    it('installs metadata and increments the collection count', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createLimitedToken(CREATOR, 'Sets', 'A', 'first card', true, 0, 100, 'uri-a', 2500)

      expect(identity).toEqual({ creator: CREATOR, collection: 'Sets', name: 'A' })
      expect(ledger.getCollection(CREATOR, 'Sets')?.count).toBe(1)
      expect(ledger.getTokenType(identity)).toEqual({
        collection: 'Sets',
        name: 'A',
        description: 'first card',
        uri: 'uri-a',
        maximum: 100,
        supply: 0,
        royalty: { rate: 2500, payee: CREATOR }
      })
    })

    it('leaves supply untracked unless requested', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', false, 7, '', 0)

      expect(ledger.supplyOf(identity)).toBeUndefined()
      expect(ledger.balanceOf(CREATOR, identity)).toBe(7)
    })

    it('rejects a second token type with the same identity', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 1, '', 0)

      expectLedgerError(() => ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 1, '', 0), 'TokenAlreadyExists')
      expect(ledger.getCollection(CREATOR, 'Sets')?.count).toBe(1)
      expect(ledger.balanceOf(CREATOR, AssetId.create(CREATOR, 'Sets', 'A'))).toBe(1)
    })

    it('fails the (m+1)-th token type of a collection capped at m', () => {
      ledger.createLimitedCollection(CREATOR, 'Sets', '', '', 3)
      ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', false, 0, '', 0)
      ledger.createUnlimitedToken(CREATOR, 'Sets', 'B', '', false, 0, '', 0)
      ledger.createUnlimitedToken(CREATOR, 'Sets', 'C', '', false, 0, '', 0)

      expectLedgerError(() => ledger.createUnlimitedToken(CREATOR, 'Sets', 'D', '', false, 0, '', 0), 'CollectionLimitExceeded')
      expect(ledger.getCollection(CREATOR, 'Sets')?.count).toBe(3)
      expect(ledger.getTokenType(AssetId.create(CREATOR, 'Sets', 'D'))).toBeUndefined()
    })

    it('rolls back the collection count when the initial mint exceeds the maximum', () => {
      ledger.createLimitedCollection(CREATOR, 'Sets', '', '', 2)

      expectLedgerError(() => ledger.createLimitedToken(CREATOR, 'Sets', 'A', '', true, 5, 4, '', 0), 'MintLimitExceeded')
      expect(ledger.getCollection(CREATOR, 'Sets')?.count).toBe(0)
      expect(ledger.getTokenType(AssetId.create(CREATOR, 'Sets', 'A'))).toBeUndefined()
      expect(ledger.balancesOf(CREATOR)).toEqual([])
    })

    it('does not enforce the maximum when supply is untracked', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createLimitedToken(CREATOR, 'Sets', 'A', '', false, 5, 4, '', 0)

      expect(ledger.balanceOf(CREATOR, identity)).toBe(5)
    })

    it('rejects royalty rates above one million points', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      expectLedgerError(() => ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 0, '', 1_000_001), 'InvalidArgument')
    })

    it('emits deposit, mint and creation events for the initial amount', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', 'card', true, 5, 'uri', 10)

      expect(ledger.eventsOf(CREATOR, 'deposit').map(record => record.data)).toEqual([
        { type: 'Deposited', identity, amount: 5 }
      ])
      expect(ledger.eventsOf(CREATOR, 'mint').map(record => record.data)).toEqual([
        { type: 'MintNotification', identity, amount: 5 }
      ])
      const creation = ledger.eventsOf(CREATOR, 'creation')
      expect(creation.map(record => record.sequence)).toEqual([0, 1])
      expect(creation[1].data).toEqual({
        type: 'TokenTypeCreated',
        identity,
        metadata: {
          collection: 'Sets',
          name: 'A',
          description: 'card',
          uri: 'uri',
          supply: 5,
          royalty: { rate: 10, payee: CREATOR }
        },
        initialAmount: 5
      })
    })
  })

  describe('mint', () => {
    it('increases tracked supply and the destination balance by exactly the amount', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 2, '', 0)

      ledger.mint(CREATOR, HOLDER, CREATOR, 'Sets', 'A', 6)

      expect(ledger.supplyOf(identity)).toBe(8)
      expect(ledger.balanceOf(HOLDER, identity)).toBe(6)
      expect(ledger.balanceOf(CREATOR, identity)).toBe(2)
    })

    it('scenario A: a token capped at one cannot be minted again', () => {
      ledger.createLimitedCollection(CREATOR, 'Sets', '', '', 2)
      const identity = ledger.createLimitedToken(CREATOR, 'Sets', 'A', '', true, 1, 1, '', 0)
      expect(ledger.balanceOf(CREATOR, identity)).toBe(1)

      expectLedgerError(() => ledger.mint(CREATOR, CREATOR, CREATOR, 'Sets', 'A', 1), 'MintLimitExceeded')
      expect(ledger.supplyOf(identity)).toBe(1)
      expect(ledger.balanceOf(CREATOR, identity)).toBe(1)
    })

    it('scenario B: a collection capped at one rejects a second token type', () => {
      ledger.createLimitedCollection(CREATOR, 'Sets', '', '', 1)
      ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 0, '', 0)

      expectLedgerError(() => ledger.createUnlimitedToken(CREATOR, 'Sets', 'B', '', true, 0, '', 0), 'CollectionLimitExceeded')
    })

    it('allows minting up to the maximum exactly', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createLimitedToken(CREATOR, 'Sets', 'A', '', true, 0, 10, '', 0)

      ledger.mint(CREATOR, HOLDER, CREATOR, 'Sets', 'A', 10)
      expect(ledger.supplyOf(identity)).toBe(10)
    })

    it('requires a mint capability in the authorizer\'s own registry', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 0, '', 0)

      expectLedgerError(() => ledger.mint(OTHER, OTHER, CREATOR, 'Sets', 'A', 1), 'RegistryNotPublished')

      ledger.createUnlimitedCollection(OTHER, 'Mine', '', '')
      expectLedgerError(() => ledger.mint(OTHER, OTHER, CREATOR, 'Sets', 'A', 1), 'NoMintCapability')
    })

    it('requires the token type to exist', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      expectLedgerError(() => ledger.mint(CREATOR, HOLDER, CREATOR, 'Sets', 'Missing', 1), 'NoMintCapability')
    })

    it('emits a MintNotification on the creator registry', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', false, 0, '', 0)

      ledger.mint(CREATOR, HOLDER, CREATOR, 'Sets', 'A', 3)

      expect(ledger.eventsOf(CREATOR, 'mint').map(record => record.data)).toEqual([
        { type: 'MintNotification', identity, amount: 3 }
      ])
      expect(ledger.eventsOf(HOLDER, 'deposit').map(record => record.data)).toEqual([
        { type: 'Deposited', identity, amount: 3 }
      ])
    })
  })

  describe('burn', () => {
    it('decreases tracked supply by the burned amount exactly once', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 10, '', 0)

      ledger.burn(CREATOR, CREATOR, 'Sets', 'A', 4)

      expect(ledger.supplyOf(identity)).toBe(6)
      expect(ledger.balanceOf(CREATOR, identity)).toBe(6)
      expect(ledger.eventsOf(CREATOR, 'burn').map(record => record.data)).toEqual([
        { type: 'Burned', identity, amount: 4 }
      ])
    })

    it('requires a burn capability in the owner\'s registry', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 10, '', 0)
      ledger.directTransfer(CREATOR, HOLDER, CREATOR, 'Sets', 'A', 3)

      expectLedgerError(() => ledger.burn(HOLDER, CREATOR, 'Sets', 'A', 1), 'RegistryNotPublished')

      ledger.createUnlimitedCollection(HOLDER, 'Mine', '', '')
      expectLedgerError(() => ledger.burn(HOLDER, CREATOR, 'Sets', 'A', 1), 'NoBurnCapability')
      expect(ledger.balanceOf(HOLDER, identity)).toBe(3)
      expect(ledger.supplyOf(identity)).toBe(10)
    })

    it('burns a unit composed inside a transaction', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 10, '', 0)

      ledger.execute(tx => {
        const unit = ledger.inventories.withdraw(tx, CREATOR, identity, 5)
        const kept = unit.split(2)
        ledger.collections.burn(tx, CREATOR, unit)
        ledger.inventories.deposit(tx, CREATOR, kept)
      })

      expect(ledger.supplyOf(identity)).toBe(7)
      expect(ledger.balanceOf(CREATOR, identity)).toBe(7)
    })

    it('traps when burning more than the holder owns', () => {
      ledger.createUnlimitedCollection(CREATOR, 'Sets', '', '')
      const identity = ledger.createUnlimitedToken(CREATOR, 'Sets', 'A', '', true, 2, '', 0)

      expect(() => ledger.burn(CREATOR, CREATOR, 'Sets', 'A', 3)).toThrow(ArithmeticTrap)
      expect(ledger.supplyOf(identity)).toBe(2)
    })
  })
})
