import { TransferError, ValidationError } from '../../src/errors';
import { BankService } from '../../src/services/bank.service';
import { ADDRESSES } from '../fixtures/marketplace';

describe('BankService', () => {
  let bank: BankService;

  beforeEach(() => {
    bank = new BankService();
    bank.deposit(ADDRESSES.buyer, 100n);
  });

  it('credits deposits and reports balances case-insensitively', () => {
    expect(bank.deposit('0xC000000000000000000000000000000000000C01', 5n)).toBe(5n);
    expect(bank.balanceOf(ADDRESSES.collection)).toBe(5n);
    expect(bank.balanceOf(ADDRESSES.buyer)).toBe(100n);
    expect(bank.balanceOf(ADDRESSES.seller)).toBe(0n);
  });

  it('rejects non-positive deposits', () => {
    expect(() => bank.deposit(ADDRESSES.buyer, 0n)).toThrow(ValidationError);
  });

  it('moves value between accounts', () => {
    bank.transfer(ADDRESSES.buyer, ADDRESSES.seller, 40n);

    expect(bank.balanceOf(ADDRESSES.buyer)).toBe(60n);
    expect(bank.balanceOf(ADDRESSES.seller)).toBe(40n);
  });

  it('refuses overdrafts', () => {
    expect(() => bank.transfer(ADDRESSES.buyer, ADDRESSES.seller, 101n)).toThrow('Insufficient balance for transfer');
    expect(bank.balanceOf(ADDRESSES.buyer)).toBe(100n);
  });

  it('refuses zero and burn recipients', () => {
    expect(() => bank.transfer(ADDRESSES.buyer, ADDRESSES.zero, 1n)).toThrow(TransferError);
    expect(() => bank.transfer(ADDRESSES.buyer, ADDRESSES.burn, 1n)).toThrow(TransferError);
  });

  it('undoes a transfer the recipient hook rejects', () => {
    bank.onReceive(ADDRESSES.seller, () => {
      throw new Error('not accepting');
    });

    expect(() => bank.transfer(ADDRESSES.buyer, ADDRESSES.seller, 10n)).toThrow(
      'Transfer rejected by recipient: not accepting'
    );
    expect(bank.balanceOf(ADDRESSES.buyer)).toBe(100n);
    expect(bank.balanceOf(ADDRESSES.seller)).toBe(0n);
  });

  it('passes sender and amount to the hook and can clear it', () => {
    const hook = jest.fn();
    bank.onReceive(ADDRESSES.seller, hook);
    bank.transfer(ADDRESSES.buyer, ADDRESSES.seller, 7n);

    expect(hook).toHaveBeenCalledWith(ADDRESSES.buyer, 7n);

    bank.onReceive(ADDRESSES.seller, undefined);
    bank.transfer(ADDRESSES.buyer, ADDRESSES.seller, 1n);
    expect(hook).toHaveBeenCalledTimes(1);
  });

  it('restores balances from a checkpoint', () => {
    const restore = bank.checkpoint();
    bank.transfer(ADDRESSES.buyer, ADDRESSES.seller, 30n);
    restore();

    expect(bank.balanceOf(ADDRESSES.buyer)).toBe(100n);
    expect(bank.balanceOf(ADDRESSES.seller)).toBe(0n);
  });
});
