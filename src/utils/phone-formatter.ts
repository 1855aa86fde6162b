export class PhoneFormatter {
    /**
     * Strips everything but digits. Returns the 10-digit number, or null when
     * the digit count is anything other than 10.
     */
    static normalize(phone: string): string | null {
        const digits = phone.replace(/\D/g, '');
        return digits.length === 10 ? digits : null;
    }

    static format(phone: string): string {
        const digits = this.normalize(phone);
        if (!digits) return phone;
        return `(${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6)}`;
    }

    static isValid(phone: string): boolean {
        return this.normalize(phone) !== null;
    }
}
